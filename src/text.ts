import fs from 'fs';
import path from 'path';
import type { DeclaredLicense } from './types';
import { type MetadataSource, getAttribute, getString, getStrings } from './attributes';

const DESCRIPTION_PADDING = ' '.repeat(8);
const PADDED_LINE = /^ {8}\S/;
const LICENSE_CLASSIFIER_PREFIX = 'License';
const UNKNOWN_LICENSE = 'UNKNOWN';

export function buildDescription(summary?: string, body?: string): string | undefined {
  const cleanSummary = (summary || '').trim();
  const cleanBody = (body || '').trim();
  if (cleanSummary && cleanBody) return `${cleanSummary}\n${cleanBody}`;
  return cleanSummary || cleanBody || undefined;
}

/**
 * Legacy metadata pads every continuation line of a long field with eight
 * spaces. Strip that padding when either of the first two lines carries
 * exactly eight spaces before its text; deeper indentation there is content,
 * so a cleaned description is left as it is.
 */
export function cleanDescription(text?: string): string {
  const description = (text || '').trim();
  const lines = description.split(/\r\n|\r|\n/);
  const needsCleaning = lines.slice(0, 2).some((line) => PADDED_LINE.test(line));
  if (!needsCleaning) return description;
  return lines
    .map((line) => (line.startsWith(DESCRIPTION_PADDING) ? line.slice(DESCRIPTION_PADDING.length) : line))
    .join('\n');
}

function readLegacyDescription(dir: string): string | undefined {
  const location = path.join(dir, 'DESCRIPTION.rst');
  if (!fs.existsSync(location)) return undefined;
  return fs.readFileSync(location, 'utf8');
}

/**
 * Newer metadata carries the long description as the payload, older metadata
 * as a `Description` field, and the oldest as a DESCRIPTION.rst file next to
 * the descriptor at `location`.
 */
export function getDescription(source: MetadataSource, location?: string): string | undefined {
  let description = source.getPayload?.().trim() || undefined;
  if (!description) {
    description = getString(source, 'Description');
    if (!description && location) {
      description = readLegacyDescription(path.dirname(location));
    }
  }
  const summary = getString(source, 'Summary');
  return buildDescription(summary, cleanDescription(description));
}

export interface Classifiers {
  license: string[];
  other: string[];
}

export function getClassifiers(source: MetadataSource): Classifiers {
  let classifiers = getStrings(source, 'Classifier');
  if (!classifiers.length) classifiers = getStrings(source, 'Classifiers');
  const result: Classifiers = { license: [], other: [] };
  for (const classifier of classifiers) {
    if (classifier.startsWith(LICENSE_CLASSIFIER_PREFIX)) result.license.push(classifier);
    else result.other.push(classifier);
  }
  return result;
}

export function getDeclaredLicense(source: MetadataSource): DeclaredLicense {
  const declared: DeclaredLicense = {};
  const license = getString(source, 'License');
  if (license && license !== UNKNOWN_LICENSE) declared.license = license;
  const { license: classifiers } = getClassifiers(source);
  if (classifiers.length) declared.classifiers = classifiers;
  return declared;
}

/** Keywords field entries followed by every non-license classifier, without duplicates. */
export function getKeywords(source: MetadataSource): string[] {
  const raw = getAttribute(source, 'Keywords');
  let entries: string[] = [];
  if (typeof raw === 'string') entries = raw.split(',');
  else if (Array.isArray(raw)) entries = raw.filter((k): k is string => typeof k === 'string');
  else if (raw !== undefined) entries = [String(raw)];

  const keywords = new Set<string>();
  for (const entry of entries) {
    const keyword = entry.trim();
    if (keyword) keywords.add(keyword);
  }
  getClassifiers(source).other.forEach((classifier) => keywords.add(classifier));
  return Array.from(keywords);
}
