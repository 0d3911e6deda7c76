import stringWidth from 'string-width';

/**
 * Terminal/editor column width of `text`: wide CJK and emoji count as 2,
 * combining marks and zero-width characters as 0.
 */
export function displayWidth(text: string): number {
    return stringWidth(text);
}

/**
 * Right-pads `text` with spaces up to `width` display columns. Text already at
 * or beyond `width` is returned unchanged.
 */
export function padToDisplayWidth(text: string, width: number): string {
    const padding = width - displayWidth(text);
    return padding > 0 ? text + ' '.repeat(padding) : text;
}
