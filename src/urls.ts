import type { PackageUrls } from './types';
import { type MetadataSource, getAttribute, getString, isPlainObject } from './attributes';

type UrlSlot = 'homepageUrl' | 'vcsUrl' | 'bugTrackingUrl' | 'codeViewUrl';

// Project-URL labels are free-form; only these map onto a canonical slot.
const LABEL_SLOTS: Array<{ slot: UrlSlot; labels: string[] }> = [
  {
    slot: 'bugTrackingUrl',
    labels: ['tracker', 'bug reports', 'github: issues', 'bug tracker', 'issues', 'issue tracker']
  },
  { slot: 'codeViewUrl', labels: ['source', 'source code', 'code'] },
  { slot: 'vcsUrl', labels: ['github', 'gitlab', 'github: repo', 'repository'] },
  { slot: 'homepageUrl', labels: ['website', 'homepage', 'home'] }
];

const DOWNLOAD_URL_LABEL = 'Download-URL';

export function classifyUrlLabel(label: string): UrlSlot | undefined {
  const normalized = label.trim().toLowerCase();
  return LABEL_SLOTS.find((entry) => entry.labels.includes(normalized))?.slot;
}

/** Registry URLs computed from a name and version. */
export function getPypiUrls(
  name?: string,
  version?: string
): Pick<PackageUrls, 'repositoryHomepageUrl' | 'repositoryDownloadUrl' | 'apiDataUrl'> {
  if (!name) return {};
  return {
    repositoryHomepageUrl: `https://pypi.org/project/${name}`,
    repositoryDownloadUrl: version
      ? `https://pypi.org/packages/source/${name[0]}/${name}/${name}-${version}.tar.gz`
      : undefined,
    apiDataUrl: version ? `https://pypi.org/pypi/${name}/${version}/json` : `https://pypi.org/pypi/${name}/json`
  };
}

/**
 * Project URLs come either as `"Label, https://..."` header values or as a
 * label to URL mapping.
 */
export function getProjectUrls(source: MetadataSource): Array<[string, string]> {
  const entries = getAttribute(source, 'Project-URL', true);
  const projectUrls = entries.length ? entries : getAttribute(source, 'project_urls');
  const pairs: Array<[string, string]> = [];
  if (isPlainObject(projectUrls)) {
    for (const [label, url] of Object.entries(projectUrls)) {
      if (typeof url === 'string') pairs.push([label.trim(), url.trim()]);
    }
    return pairs;
  }
  const list: unknown[] = Array.isArray(projectUrls) ? projectUrls : [projectUrls];
  for (const entry of list) {
    if (typeof entry !== 'string') continue;
    const comma = entry.indexOf(',');
    if (comma === -1) continue;
    pairs.push([entry.slice(0, comma).trim(), entry.slice(comma + 1).trim()]);
  }
  return pairs;
}

/**
 * Sort every URL of a package into its canonical slot. A slot keeps the first
 * URL that reaches it: the homepage field, then project URLs in order, then the
 * download URL. Anything else lands in `extraUrls` under its label.
 */
export function getUrls(source: MetadataSource, name?: string, version?: string): PackageUrls {
  const urls: PackageUrls = { ...getPypiUrls(name, version), extraUrls: {} };

  const addUrl = (url: string | undefined, label?: string, slot?: UrlSlot): void => {
    if (!url) return;
    if (slot && !urls[slot]) urls[slot] = url;
    else if (label) urls.extraUrls[label] = url;
  };

  const homepage = getString(source, 'Home-page') || getString(source, 'url') || getString(source, 'home');
  addUrl(homepage, undefined, 'homepageUrl');

  for (const [label, url] of getProjectUrls(source)) {
    addUrl(url, label, classifyUrlLabel(label));
  }

  addUrl(getString(source, 'Download-URL'), DOWNLOAD_URL_LABEL, 'vcsUrl');
  return urls;
}
