// src/map/maplibre-services/protocols.ts
// URL schemes MapLibre sources may use besides http(s). Registration is
// module-wide and happens once per page.

import * as maplibregl from 'maplibre-gl';
import { Protocol } from 'pmtiles';
import { CDN_ASSETS } from '../../config/cdn';
import { isRecord } from '../../protocol/guards';
import { loadScript } from '../../utils/asset-loader';

type ProtocolAction = Parameters<typeof maplibregl.addProtocol>[1];

let pmtilesRegistered = false;
let cogRegistered = false;

export function registerPmtilesProtocol(): void {
    if (pmtilesRegistered) return;
    const protocol = new Protocol();
    maplibregl.addProtocol('pmtiles', protocol.tile);
    pmtilesRegistered = true;
}

/** The handler the COG protocol script leaves on the page, if it has run. */
function pageCogHandler(): ProtocolAction | null {
    const namespace: unknown = Reflect.get(globalThis, 'MaplibreCOGProtocol');
    if (!isRecord(namespace)) return null;
    const handler = namespace.cogProtocol;
    if (typeof handler !== 'function') return null;
    return (params, abortController) => Reflect.apply(handler, namespace, [params, abortController]);
}

/**
 * Registers cog:// right away; the script that decodes GeoTIFFs is fetched
 * on the first tile request.
 */
export function registerCogProtocol(): void {
    if (cogRegistered) return;
    maplibregl.addProtocol('cog', async (params, abortController) => {
        await loadScript(CDN_ASSETS.cogProtocolJs, () => pageCogHandler() !== null);
        const handler = pageCogHandler();
        if (!handler) {
            throw new Error('[protocols] The COG script loaded but did not define MaplibreCOGProtocol.cogProtocol.');
        }
        return handler(params, abortController);
    });
    cogRegistered = true;
}

export function registerProtocols(): void {
    registerPmtilesProtocol();
    registerCogProtocol();
}
