/**
 * Content-type to retrieval-strategy mapping
 *
 * - Google-native documents with a text export → export
 * - Text-compatible uploaded files → download and decode as UTF-8
 * - Everything else → unsupported
 */

export const FOLDER_MIME_TYPE = 'application/vnd.google-apps.folder';
const GOOGLE_APPS_PREFIX = 'application/vnd.google-apps.';

/**
 * Export formats for Google-native documents
 * Native types missing here (folders, drawings, forms, shortcuts...) have no text form
 */
export const GOOGLE_APPS_TEXT_EXPORTS: Readonly<Record<string, string>> = {
  'application/vnd.google-apps.document': 'text/plain',
  'application/vnd.google-apps.spreadsheet': 'text/csv',
  'application/vnd.google-apps.presentation': 'text/plain',
  'application/vnd.google-apps.script': 'application/vnd.google-apps.script+json',
};

/**
 * Non-text/* types whose bytes are text
 */
export const TEXT_APPLICATION_TYPES: ReadonlySet<string> = new Set([
  'application/json',
  'application/ld+json',
  'application/xml',
  'application/javascript',
  'application/x-javascript',
  'application/ecmascript',
  'application/typescript',
  'application/x-typescript',
  'application/x-sh',
  'application/x-shellscript',
  'application/sql',
  'application/x-sql',
  'application/yaml',
  'application/x-yaml',
  'application/toml',
  'application/x-httpd-php',
  'application/x-tex',
  'application/x-ndjson',
  'application/csv',
  'application/rtf',
]);

export type RetrievalStrategy =
  | { kind: 'export'; exportMimeType: string }
  | { kind: 'download' }
  | { kind: 'unsupported'; reason: string };

/**
 * Strips parameters (e.g. "; charset=utf-8") and lowercases a MIME type
 */
function baseMimeType(mimeType: string): string {
  return mimeType.split(';')[0].trim().toLowerCase();
}

function isTextCompatible(mimeType: string): boolean {
  return (
    mimeType.startsWith('text/') ||
    TEXT_APPLICATION_TYPES.has(mimeType) ||
    mimeType.endsWith('+json') ||
    mimeType.endsWith('+xml')
  );
}

/**
 * Decides how a file's content is read
 * Total over all strings; unknown types resolve to unsupported
 */
export function resolveRetrievalStrategy(mimeType: string): RetrievalStrategy {
  const base = baseMimeType(mimeType);

  if (base.startsWith(GOOGLE_APPS_PREFIX)) {
    const exportMimeType = GOOGLE_APPS_TEXT_EXPORTS[base];
    if (exportMimeType) {
      return { kind: 'export', exportMimeType };
    }
    if (base === FOLDER_MIME_TYPE) {
      return { kind: 'unsupported', reason: 'Folders have no content; use list_folder_contents instead' };
    }
    return { kind: 'unsupported', reason: `Google file type ${base} has no text export` };
  }

  if (isTextCompatible(base)) {
    return { kind: 'download' };
  }

  return {
    kind: 'unsupported',
    reason: `Files of type ${base || 'unknown'} have no text representation; use get_file_metadata instead`,
  };
}
