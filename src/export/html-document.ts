// src/export/html-document.ts
// Assembles a standalone HTML page around one map's exported state.

import type { AssetBundle } from '../config/cdn';
import type { QueueTraits } from '../store/IState';
import { escapeHtml, toScriptJson } from '../utils/html';

export interface HtmlExportOptions {
    title?: string;
    /** CSS width of the map element; the widget's width trait when omitted */
    width?: string;
    height?: string;
}

/** What a backend contributes to the exported page. */
export interface ExportDocument {
    assets: AssetBundle;
    state: object;
    /**
     * Script body run once the page has loaded. It sees `mapState` and
     * `container` (the map element) in scope.
     */
    initScript: string;
    /** Extra markup placed before the map element, e.g. Potree's sidebar. */
    bodyPrefix?: string;
    /** Extra rules appended to the page stylesheet */
    css?: string;
}

export interface ResolvedPage {
    title: string;
    width: string;
    height: string;
}

const CSS_SIZE = /^(\d+(\.\d+)?(px|%|vh|vw|em|rem)|auto)$/;

/** Keeps a CSS length only when it is a plain size; anything else falls back. */
export function cssSize(value: string | undefined, fallback: string): string {
    if (value === undefined) return fallback;
    const trimmed = value.trim();
    return CSS_SIZE.test(trimmed) ? trimmed : fallback;
}

/** Drops the queues and the widget id, which only matter to a live view. */
export function withoutQueues<T extends QueueTraits>(traits: T): Omit<T, keyof QueueTraits> {
    const { _js_calls, _js_events, _queue, _widget_id, ...rest } = traits;
    return rest;
}

function indent(text: string, prefix: string): string {
    return text
        .split('\n')
        .map(line => (line.length > 0 ? prefix + line : line))
        .join('\n');
}

export function renderHtmlDocument(page: ResolvedPage, doc: ExportDocument): string {
    const links = doc.assets.styles.map(href => `    <link rel="stylesheet" href="${escapeHtml(href)}" />`);
    const scripts = doc.assets.scripts.map(src => `    <script src="${escapeHtml(src)}"></script>`);
    const css = [
        'body { margin: 0; padding: 0; font-family: sans-serif; }',
        `#map { width: ${page.width}; height: ${page.height}; position: relative; }`,
        doc.css ?? '',
    ].filter(rule => rule.length > 0);

    return [
        '<!DOCTYPE html>',
        '<html lang="en">',
        '<head>',
        '    <meta charset="utf-8" />',
        '    <meta name="viewport" content="width=device-width, initial-scale=1" />',
        `    <title>${escapeHtml(page.title)}</title>`,
        ...links,
        ...scripts,
        '    <style>',
        indent(css.join('\n'), '        '),
        '    </style>',
        '</head>',
        '<body>',
        ...(doc.bodyPrefix ? [indent(doc.bodyPrefix, '    ')] : []),
        '    <div id="map"></div>',
        '    <script>',
        `        const mapState = ${toScriptJson(doc.state)};`,
        '        (function () {',
        "            const container = document.getElementById('map');",
        indent(doc.initScript.trim(), '            '),
        '        })();',
        '    </script>',
        '</body>',
        '</html>',
        '',
    ].join('\n');
}
