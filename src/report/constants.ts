/**
 * Report format constants.
 *
 * These values define the "wire format" of report documents:
 * - The explicit column-group markers authors wrap image rows in.
 * - Defaults applied when callers omit metadata.
 */
export const COLUMNS_BEGIN_MARKER = '<!-- columns -->';
export const COLUMNS_END_MARKER = '<!-- /columns -->';

/**
 * Default heading of the generated table of contents.
 */
export const DEFAULT_TOC_TITLE = 'Contents';

/**
 * Default `lang` attribute of the assembled document.
 */
export const DEFAULT_DOCUMENT_LANG = 'en';

export const DEFAULT_AUTHOR = 'Research Report Generator';

/**
 * Version reported by the CLI and advertised by the MCP server.
 */
export const REPORT_VERSION = '0.1.0';
