// src/utils/asset-loader.ts
// Idempotent script and stylesheet injection. Every asset is keyed by an
// element id, so a second render (or a second widget) reuses what the page has.

const scriptPromises = new Map<string, Promise<void>>();

function assetId(prefix: string, url: string): string {
    return `${prefix}-${url.replace(/[^a-z0-9]+/gi, '-').replace(/^-+|-+$/g, '').toLowerCase()}`;
}

/** Adds a stylesheet link once. Does not wait for it to load. */
export function loadStyle(href: string, id = assetId('anymap-css', href)): void {
    if (document.getElementById(id)) return;
    const link = document.createElement('link');
    link.id = id;
    link.rel = 'stylesheet';
    link.href = href;
    document.head.appendChild(link);
}

/** Adds an inline style block once. */
export function injectStyle(id: string, css: string): void {
    if (document.getElementById(id)) return;
    const style = document.createElement('style');
    style.id = id;
    style.textContent = css;
    document.head.appendChild(style);
}

/**
 * Loads a classic script once and resolves when it has run. Pass `isReady`
 * to skip the request when the global it defines is already present.
 */
export function loadScript(src: string, isReady?: () => boolean): Promise<void> {
    if (isReady?.()) return Promise.resolve();

    const cached = scriptPromises.get(src);
    if (cached) return cached;

    const promise = new Promise<void>((resolve, reject) => {
        const id = assetId('anymap-js', src);
        const existing = document.getElementById(id);
        const script = existing instanceof HTMLScriptElement ? existing : document.createElement('script');
        if (existing && existing === script && script.dataset.loaded === 'true') {
            resolve();
            return;
        }
        script.id = id;
        script.src = src;
        script.async = true;
        script.onload = () => {
            script.dataset.loaded = 'true';
            resolve();
        };
        script.onerror = () => {
            scriptPromises.delete(src);
            reject(new Error(`[assets] Failed to load ${src}`));
        };
        if (!existing) {
            document.head.appendChild(script);
        }
    });

    scriptPromises.set(src, promise);
    return promise;
}

/** Loads scripts one after another, for libraries that depend on earlier globals. */
export async function loadScriptsInOrder(sources: string[]): Promise<void> {
    for (const src of sources) {
        await loadScript(src);
    }
}

/** Forgets cached script promises. Tests use this between cases. */
export function resetAssetCache(): void {
    scriptPromises.clear();
}
