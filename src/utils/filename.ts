/**
 * Download filename derivation
 */

/** Used when the name yields no usable characters */
export const DEFAULT_NAME_TOKEN = 'usuario';

/**
 * Turn a person's name into a filename-safe token.
 *
 * Accented letters are folded to ASCII, anything outside letters, digits,
 * underscore, hyphen and space is dropped, and whitespace runs become a
 * single underscore.
 *
 * @example
 * sanitizeNameToken('João Silva!!') // 'Joao_Silva'
 */
export function sanitizeNameToken(name: string): string {
  const token = name
    .trim()
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/[^a-zA-Z0-9_\- ]/g, '')
    .trim()
    .replace(/\s+/g, '_');
  return token || DEFAULT_NAME_TOKEN;
}

/**
 * Filename offered for the generated handover document
 */
export function buildDownloadFilename(name: string): string {
  return `Termo_de_entrega_${sanitizeNameToken(name)}.pdf`;
}
