/**
 * Quoting rules for TOON scalars and keys.
 *
 * `quote()` and `unescape()` are inverses over the escaped character set:
 * backslash, double quote, newline, carriage return and tab.
 */

const STRUCTURAL_CHARS = /[,|[\]{}:"\\\n\r\t]/;
const NUMBER_LIKE = /^-?\d/;
const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

const ESCAPES: Record<string, string> = {
    '\\': '\\',
    '"': '"',
    n: '\n',
    r: '\r',
    t: '\t',
};

export function needsQuoting(value: string): boolean {
    if (value === '') return true;
    if (value === 'true' || value === 'false' || value === 'null') return true;
    if (NUMBER_LIKE.test(value)) return true;
    if (STRUCTURAL_CHARS.test(value)) return true;
    return /^\s/.test(value) || /\s$/.test(value);
}

function escapeString(value: string): string {
    // Backslash first so the escapes added below are not doubled.
    return value
        .replace(/\\/g, '\\\\')
        .replace(/"/g, '\\"')
        .replace(/\n/g, '\\n')
        .replace(/\r/g, '\\r')
        .replace(/\t/g, '\\t');
}

export function quote(value: string): string {
    if (!needsQuoting(value)) {
        return value;
    }
    return `"${escapeString(value)}"`;
}

/**
 * Reverses `escapeString`. Unknown escape sequences are kept verbatim.
 */
export function unescape(value: string): string {
    let result = '';
    for (let i = 0; i < value.length; i++) {
        const ch = value[i];
        if (ch === '\\' && i + 1 < value.length) {
            const replacement = ESCAPES[value[i + 1]];
            if (replacement !== undefined) {
                result += replacement;
                i++;
                continue;
            }
        }
        result += ch;
    }
    return result;
}

export function isValidIdentifier(key: string): boolean {
    return IDENTIFIER.test(key);
}

export function formatKey(key: string): string {
    if (isValidIdentifier(key)) {
        return key;
    }
    return `"${escapeString(key)}"`;
}

/**
 * Returns the string a raw row or key token stands for: quoted tokens are
 * unescaped, anything else is trimmed.
 */
export function unquote(token: string): string {
    const trimmed = token.trim();
    if (trimmed.length >= 2 && trimmed.startsWith('"') && trimmed.endsWith('"') && !isEscapedAt(trimmed, trimmed.length - 1)) {
        return unescape(trimmed.slice(1, -1));
    }
    return trimmed;
}

function isEscapedAt(text: string, index: number): boolean {
    let backslashes = 0;
    for (let i = index - 1; i >= 0 && text[i] === '\\'; i--) {
        backslashes++;
    }
    return backslashes % 2 === 1;
}
