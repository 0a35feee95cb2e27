// src/map/cesium-services/MapLayerService.ts

import {
    Cesium3DTileset,
    CesiumTerrainProvider,
    Color,
    EllipsoidTerrainProvider,
    GeoJsonDataSource,
    ImageryLayer,
    UrlTemplateImageryProvider,
    createWorldTerrainAsync,
} from 'cesium';
import type { TerrainProvider, Viewer } from 'cesium';
import type { CesiumLayerRecord, CesiumTerrainRecord } from '../../store/backend-traits';

type PlacedLayer =
    | { kind: 'imagery'; layer: ImageryLayer }
    | { kind: 'datasource'; dataSource: GeoJsonDataSource }
    | { kind: 'tileset'; tileset: Cesium3DTileset };

/** Terrain provider for a record. Ion world terrain needs a token. */
export async function createTerrainProvider(record: CesiumTerrainRecord | null): Promise<TerrainProvider> {
    if (!record || record.type === 'ellipsoid') return new EllipsoidTerrainProvider();
    if (record.type === 'world') return createWorldTerrainAsync();
    return CesiumTerrainProvider.fromUrl(record.url);
}

/**
 * Imagery layers, GeoJSON data sources and 3D tilesets keyed by layer id.
 * GeoJSON and tilesets load asynchronously; a layer removed or replaced
 * while loading is discarded when it arrives.
 */
export class MapLayerService {
    private readonly placed = new Map<string, PlacedLayer>();
    private readonly pending = new Map<string, CesiumLayerRecord>();
    private terrainRequest = 0;

    constructor(
        private readonly viewer: Viewer,
        private readonly onError: (method: string, error: unknown) => void
    ) {}

    public addLayer(id: string, record: CesiumLayerRecord): void {
        this.removeLayer(id);
        this.pending.set(id, record);
        switch (record.type) {
            case 'imagery': {
                const provider = new UrlTemplateImageryProvider({ url: record.url, credit: record.credit });
                const layer = this.viewer.imageryLayers.addImageryProvider(provider);
                layer.alpha = record.alpha;
                this.place(id, record, { kind: 'imagery', layer });
                break;
            }
            case 'geojson':
                GeoJsonDataSource.load(record.data, {
                    stroke: Color.fromCssColorString(record.stroke),
                    fill: Color.fromCssColorString(record.fill),
                    strokeWidth: record.strokeWidth,
                    clampToGround: record.clampToGround,
                })
                    .then(dataSource => {
                        if (!this.isCurrent(id, record)) return;
                        return this.viewer.dataSources.add(dataSource).then(() =>
                            this.place(id, record, { kind: 'datasource', dataSource }));
                    })
                    .catch(error => this.fail(id, 'GeoJSON', error));
                break;
            case '3dtiles':
                Cesium3DTileset.fromUrl(record.url, { maximumScreenSpaceError: record.maximumScreenSpaceError })
                    .then(tileset => {
                        if (!this.isCurrent(id, record)) {
                            tileset.destroy();
                            return;
                        }
                        this.viewer.scene.primitives.add(tileset);
                        this.place(id, record, { kind: 'tileset', tileset });
                    })
                    .catch(error => this.fail(id, '3D tileset', error));
                break;
        }
    }

    private isCurrent(id: string, record: CesiumLayerRecord): boolean {
        return this.pending.get(id) === record;
    }

    private place(id: string, record: CesiumLayerRecord, layer: PlacedLayer): void {
        this.pending.delete(id);
        this.placed.set(id, layer);
        console.log(`[LAYER SERVICE] Added ${record.type} layer "${id}".`);
    }

    private fail(id: string, what: string, error: unknown): void {
        this.pending.delete(id);
        console.warn(`[LAYER SERVICE] ${what} for layer "${id}" could not be loaded.`, error);
        this.onError(`addLayer ${id}`, error);
    }

    public removeLayer(id: string): void {
        this.pending.delete(id);
        const layer = this.placed.get(id);
        if (!layer) return;
        this.placed.delete(id);
        switch (layer.kind) {
            case 'imagery':
                this.viewer.imageryLayers.remove(layer.layer, true);
                break;
            case 'datasource':
                this.viewer.dataSources.remove(layer.dataSource, true);
                break;
            case 'tileset':
                this.viewer.scene.primitives.remove(layer.tileset);
                break;
        }
    }

    public layerIds(): string[] {
        return [...this.placed.keys()];
    }

    /** Later requests win over earlier ones still loading. */
    public setTerrain(record: CesiumTerrainRecord | null): void {
        const request = ++this.terrainRequest;
        createTerrainProvider(record)
            .then(provider => {
                if (request !== this.terrainRequest) return;
                this.viewer.terrainProvider = provider;
                console.log(`[LAYER SERVICE] Terrain set to ${record ? record.type : 'ellipsoid'}.`);
            })
            .catch(error => {
                console.warn('[LAYER SERVICE] Terrain could not be loaded.', error);
                this.onError('setTerrain', error);
            });
    }
}
