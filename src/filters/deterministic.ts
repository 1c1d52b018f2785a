export type FileCategory = 'source' | 'test' | 'doc' | 'vendor';

const VENDORED_PATTERNS = [
  /(^|\/)vendor\//,
  /(^|\/)third_party\//,
  /(^|\/)node_modules\//,
  /(^|\/)dist\//,
  /(^|\/)build\//,
  /^package-lock\.json$/,
  /(^|\/)package-lock\.json$/,
  /(^|\/)yarn\.lock$/,
  /(^|\/)pnpm-lock\.yaml$/,
  /(^|\/)Gemfile\.lock$/,
  /(^|\/)Cargo\.lock$/,
  /(^|\/)poetry\.lock$/,
  /(^|\/)go\.sum$/,
  /\.min\.js$/,
  /\.min\.css$/,
];

const GENERATED_PATTERNS = [
  /\.generated\./,
  /(^|\/)__generated__\//,
  /\.pb\.go$/,
  /\.pb\.ts$/,
  /_pb2\.py$/,
  /\.snap$/,
];

const IGNORED_EXTENSIONS = [
  '.lock',
  '.sum',
];

const TEST_PATTERNS = [
  /(^|\/)__tests__\//,
  /(^|\/)tests?\//,
  /(^|\/)spec\//,
  /\.(test|spec)\.[^/]+$/,
  /_test\.[^/]+$/,
  /(^|\/)test_[^/]+$/,
  /(^|\/)conftest\.py$/,
];

const DOC_EXTENSIONS = ['.md', '.mdx', '.rst', '.adoc', '.txt'];

const DOC_PATTERNS = [
  /(^|\/)docs?\//,
  /(^|\/)README[^/]*$/i,
  /(^|\/)CHANGELOG[^/]*$/i,
  /(^|\/)LICENSE[^/]*$/i,
];

export function isGeneratedPath(filePath: string): boolean {
  return GENERATED_PATTERNS.some(pattern => pattern.test(filePath));
}

export function isVendoredPath(filePath: string): boolean {
  if (VENDORED_PATTERNS.some(pattern => pattern.test(filePath))) {
    return true;
  }

  if (IGNORED_EXTENSIONS.some(ext => filePath.endsWith(ext))) {
    return true;
  }

  return false;
}

export function isBoilerplatePath(filePath: string): boolean {
  return isVendoredPath(filePath) || isGeneratedPath(filePath);
}

/**
 * Categorize a path. Vendored and generated files win over test and doc
 * rules, so `vendor/foo/test/x.js` is vendor.
 */
export function categorizePath(filePath: string): FileCategory {
  if (isBoilerplatePath(filePath)) return 'vendor';
  if (TEST_PATTERNS.some(pattern => pattern.test(filePath))) return 'test';

  const lower = filePath.toLowerCase();
  if (DOC_EXTENSIONS.some(ext => lower.endsWith(ext))) return 'doc';
  if (DOC_PATTERNS.some(pattern => pattern.test(filePath))) return 'doc';

  return 'source';
}

export function fileExtension(filePath: string): string {
  const base = filePath.split('/').pop() || filePath;
  const dot = base.lastIndexOf('.');
  if (dot <= 0) return '';
  return base.slice(dot).toLowerCase();
}
