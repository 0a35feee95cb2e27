// @vitest-environment jsdom
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { injectStyle, loadScript, loadScriptsInOrder, loadStyle, resetAssetCache } from '../../src/utils/asset-loader';

function scripts(): HTMLScriptElement[] {
    return Array.from(document.head.querySelectorAll('script'));
}

describe('asset loader', () => {
    beforeEach(() => {
        document.head.innerHTML = '';
        resetAssetCache();
    });

    it('adds each stylesheet once under a derived id', () => {
        loadStyle('https://cdn.example.com/map.css');
        loadStyle('https://cdn.example.com/map.css');

        const links = document.head.querySelectorAll('link');
        expect(links.length).toBe(1);
        expect(links[0].id).toBe('anymap-css-https-cdn-example-com-map-css');
    });

    it('injects inline styles once per id', () => {
        injectStyle('fixes', '.a { color: red; }');
        injectStyle('fixes', '.b { color: blue; }');

        expect(document.getElementById('fixes')?.textContent).toBe('.a { color: red; }');
    });

    it('shares one request per script and resolves on load', async () => {
        const first = loadScript('https://cdn.example.com/lib.js');
        const second = loadScript('https://cdn.example.com/lib.js');
        expect(second).toBe(first);
        expect(scripts().length).toBe(1);

        scripts()[0].dispatchEvent(new Event('load'));

        await expect(first).resolves.toBeUndefined();
        expect(scripts()[0].dataset.loaded).toBe('true');
    });

    it('skips the request when the global is ready', async () => {
        await loadScript('https://cdn.example.com/lib.js', () => true);
        expect(scripts().length).toBe(0);
    });

    it('rejects on error and allows a retry', async () => {
        const attempt = loadScript('https://cdn.example.com/missing.js');
        scripts()[0].dispatchEvent(new Event('error'));

        await expect(attempt).rejects.toThrow('[assets] Failed to load https://cdn.example.com/missing.js');
        expect(loadScript('https://cdn.example.com/missing.js')).not.toBe(attempt);
    });

    it('loads scripts one after another', async () => {
        const done = loadScriptsInOrder(['https://cdn.example.com/a.js', 'https://cdn.example.com/b.js']);
        expect(scripts().map(s => s.src)).toEqual(['https://cdn.example.com/a.js']);

        scripts()[0].dispatchEvent(new Event('load'));
        await vi.waitFor(() => expect(scripts().length).toBe(2));
        scripts()[1].dispatchEvent(new Event('load'));

        await expect(done).resolves.toBeUndefined();
    });
});
