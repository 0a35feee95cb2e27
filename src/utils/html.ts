// src/utils/html.ts

const HTML_ESCAPES: Record<string, string> = {
    '&': '&amp;',
    '<': '&lt;',
    '>': '&gt;',
    '"': '&quot;',
    "'": '&#39;',
};

export function escapeHtml(value: string): string {
    return value.replace(/[&<>"']/g, ch => HTML_ESCAPES[ch] ?? ch);
}

/**
 * JSON for embedding inside a <script> element. Escaping "<" keeps a
 * "</script>" inside a value from closing the element.
 */
export function toScriptJson(value: unknown): string {
    return JSON.stringify(value)
        .replace(/</g, '\\u003c')
        .replace(/\u2028/g, '\\u2028')
        .replace(/\u2029/g, '\\u2029');
}
