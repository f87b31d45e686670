export type PartyType = 'person' | 'organization';
export type PartyRole = 'author' | 'maintainer';

export type DatasourceId =
  | 'pypi_sdist_pkginfo'
  | 'pypi_wheel_metadata'
  | 'pypi_setup_py'
  | 'pypi_setup_cfg'
  | 'pipfile'
  | 'pipfile_lock'
  | 'pip_requirements';

export interface Party {
  type: PartyType;
  name?: string;
  role: PartyRole;
  email?: string;
}

export interface DependentPackage {
  // Package URL, pinned only when isResolved is true
  purl?: string;
  scope: string;
  isRuntime: boolean;
  isOptional: boolean;
  isResolved: boolean;
  extractedRequirement?: string;
}

export interface DeclaredLicense {
  license?: string;
  classifiers?: string[];
}

export interface PackageUrls {
  homepageUrl?: string;
  vcsUrl?: string;
  bugTrackingUrl?: string;
  codeViewUrl?: string;
  repositoryHomepageUrl?: string;
  repositoryDownloadUrl?: string;
  apiDataUrl?: string;
  extraUrls: Record<string, string>;
}

export interface PackageRecord extends PackageUrls {
  datasourceId: DatasourceId;
  type: 'pypi';
  primaryLanguage: 'Python';
  name?: string;
  version?: string;
  description?: string;
  declaredLicense: DeclaredLicense;
  keywords: string[];
  parties: Party[];
  dependencies: DependentPackage[];
  sha256?: string;
  warnings: string[];
}

export interface ToolResult<T> {
  ok: boolean;
  data?: T;
  error?: string;
  file?: string;
}

export interface DescriptorHandler {
  datasourceId: DatasourceId;
  pathPatterns: string[];
  description: string;
  documentationUrl: string;
  parse(location: string): Promise<ToolResult<PackageRecord[]>>;
}

export interface ScannedPackage {
  datasourceId: DatasourceId;
  file: string;
  package: PackageRecord;
}

export interface ScanError {
  file: string;
  error: string;
}

export interface ScanResult {
  generatedAt: string;
  projectPath: string;
  toolVersion: string;
  packages: ScannedPackage[];
  errors: ScanError[];
}

export interface ScanOptions {
  projectPath: string;
  ignore?: string[];
}
