import type { DatasourceId, DependentPackage, PackageRecord } from './types';
import { type MetadataSource, getString } from './attributes';
import { getParties } from './parties';
import { getDeclaredLicense, getDescription, getKeywords } from './text';
import { getUrls } from './urls';

export interface RecordInput {
  location?: string;
  name?: string;
  version?: string;
  dependencies?: DependentPackage[];
  warnings?: string[];
}

export function emptyPackageRecord(datasourceId: DatasourceId): PackageRecord {
  return {
    datasourceId,
    type: 'pypi',
    primaryLanguage: 'Python',
    declaredLicense: {},
    keywords: [],
    parties: [],
    dependencies: [],
    extraUrls: {},
    warnings: []
  };
}

/**
 * Assemble a record from any metadata shape. `name` and `version` override
 * the source's own fields when a handler resolved them some other way.
 */
export function buildPackageRecord(
  datasourceId: DatasourceId,
  source: MetadataSource,
  input: RecordInput = {}
): PackageRecord {
  const name = input.name ?? getString(source, 'Name');
  const version = input.version ?? getString(source, 'Version');
  return {
    ...emptyPackageRecord(datasourceId),
    name,
    version,
    description: getDescription(source, input.location),
    declaredLicense: getDeclaredLicense(source),
    keywords: getKeywords(source),
    parties: getParties(source),
    dependencies: input.dependencies ?? [],
    ...getUrls(source, name, version),
    warnings: input.warnings ?? []
  };
}
