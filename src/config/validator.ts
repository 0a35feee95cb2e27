// src/config/validator.ts
// Runtime validator for widget options and widget config files

import type { StyleSpecification } from 'maplibre-gl';
import type { StyleSpecification as MapboxStyleSpecification } from 'mapbox-gl';
import type {
  BackendName,
  BaseWidgetOptions,
  CesiumOptions,
  GlProjectionName,
  LeafletOptions,
  MapboxOptions,
  MapLibreOptions,
  MapViewOptions,
  OpenLayersOptions,
  PotreeOptions,
  WidgetConfigFile,
} from './types.js';
import { BACKEND_NAMES } from './types.js';
import type { LatLng, OverflowPolicy, QueueOptions } from '../store/IState.js';
import type { CesiumTerrainRecord, PotreeBackground } from '../store/backend-traits.js';

export type ValidationSeverity = 'error' | 'warning';

export interface ValidationMessage {
  severity: ValidationSeverity;
  path: string;
  message: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationMessage[];
  warnings: ValidationMessage[];
}

export interface ConfigFileValidationResult extends ValidationResult {
  /** The recognised sections, holding only the values that passed */
  config: WidgetConfigFile;
}

// Known keys for each options section
const VIEW_KEYS = ['width', 'height', 'queue', 'center', 'zoom'];
const GL_KEYS = [...VIEW_KEYS, 'style', 'bearing', 'pitch', 'antialias', 'controls', 'projection'];

const KNOWN_KEYS: Record<BackendName, string[]> & { queue: string[] } = {
  maplibre: GL_KEYS,
  deckgl: GL_KEYS,
  mapbox: [...GL_KEYS, 'accessToken'],
  leaflet: [...VIEW_KEYS, 'tileLayer', 'attribution', 'mapOptions'],
  openlayers: [...VIEW_KEYS, 'basemap', 'projection', 'rotation', 'controls'],
  cesium: [...VIEW_KEYS, 'cameraHeight', 'heading', 'pitch', 'roll', 'accessToken', 'terrain'],
  potree: ['width', 'height', 'queue', 'potreeLibsDir', 'pointCloudUrl', 'description', 'pointBudget', 'fov', 'edlEnabled', 'background'],
  queue: ['capacity', 'overflow'],
};

const VALID_OVERFLOW_POLICIES: readonly OverflowPolicy[] = ['drop-oldest', 'drop-newest', 'error'];
const VALID_GL_PROJECTIONS: readonly GlProjectionName[] = ['mercator', 'globe'];
const VALID_POTREE_BACKGROUNDS: readonly PotreeBackground[] = ['gradient', 'black', 'white', 'skybox'];

type Guard<V> = (value: unknown) => value is V;

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isString(value: unknown): value is string {
  return typeof value === 'string';
}

function isBoolean(value: unknown): value is boolean {
  return typeof value === 'boolean';
}

function isNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function numberBetween(min: number, max: number): Guard<number> {
  return (value: unknown): value is number => isNumber(value) && value >= min && value <= max;
}

function isPositiveInteger(value: unknown): value is number {
  return isNumber(value) && Number.isInteger(value) && value > 0;
}

function isCssSize(value: unknown): value is string {
  return isString(value) && /^(\d+(\.\d+)?(px|%|vh|vw|em|rem)?|auto)$/.test(value.trim());
}

function isLatLng(value: unknown): value is LatLng {
  return Array.isArray(value) && value.length === 2 &&
    isNumber(value[0]) && isNumber(value[1]) &&
    value[0] >= -90 && value[0] <= 90 &&
    value[1] >= -180 && value[1] <= 180;
}

function oneOf<V extends string>(values: readonly V[]): Guard<V> {
  return (value: unknown): value is V => values.some(v => v === value);
}

function isStyleObject(value: unknown): value is StyleSpecification & MapboxStyleSpecification {
  return isObject(value) && value.version === 8 && isObject(value.sources) && Array.isArray(value.layers);
}

function isStyleValue(value: unknown): value is string | (StyleSpecification & MapboxStyleSpecification) {
  return (isString(value) && value.length > 0) || isStyleObject(value);
}

function isTerrain(value: unknown): value is CesiumTerrainRecord | null {
  if (value === null) return true;
  if (!isObject(value)) return false;
  return value.type === 'ellipsoid' || value.type === 'world' || (value.type === 'url' && isString(value.url));
}

function checkUnknownKeys(
  obj: Record<string, unknown>,
  knownKeys: string[],
  path: string,
  warnings: ValidationMessage[]
): void {
  for (const key of Object.keys(obj)) {
    if (!knownKeys.includes(key)) {
      warnings.push({
        severity: 'warning',
        path: path ? `${path}.${key}` : key,
        message: `Unknown property "${key}" will be ignored`,
      });
    }
  }
}

/**
 * Reads fields of one section, recording an error for each value that fails its guard.
 */
class SectionReader {
  constructor(
    private readonly section: Record<string, unknown>,
    private readonly path: string,
    private readonly errors: ValidationMessage[]
  ) {}

  read<V>(key: string, guard: Guard<V>, message: string): V | undefined {
    const value = this.section[key];
    if (value === undefined) return undefined;
    if (!guard(value)) {
      this.errors.push({ severity: 'error', path: this.childPath(key), message });
      return undefined;
    }
    return value;
  }

  childPath(key: string): string {
    return this.path ? `${this.path}.${key}` : key;
  }

  raw(key: string): unknown {
    return this.section[key];
  }
}

function readQueue(
  r: SectionReader,
  errors: ValidationMessage[],
  warnings: ValidationMessage[]
): Partial<QueueOptions> | undefined {
  const queue = r.raw('queue');
  if (queue === undefined) return undefined;
  const path = r.childPath('queue');
  if (!isObject(queue)) {
    errors.push({ severity: 'error', path, message: '"queue" must be an object' });
    return undefined;
  }
  checkUnknownKeys(queue, KNOWN_KEYS.queue, path, warnings);
  const q = new SectionReader(queue, path, errors);
  return {
    capacity: q.read('capacity', isPositiveInteger, '"capacity" must be a positive integer'),
    overflow: q.read('overflow', oneOf(VALID_OVERFLOW_POLICIES), `"overflow" must be one of: ${VALID_OVERFLOW_POLICIES.join(', ')}`),
  };
}

function readBase(r: SectionReader, errors: ValidationMessage[], warnings: ValidationMessage[]): BaseWidgetOptions {
  return {
    width: r.read('width', isCssSize, '"width" must be a CSS size such as "100%" or "800px"'),
    height: r.read('height', isCssSize, '"height" must be a CSS size such as "600px"'),
    queue: readQueue(r, errors, warnings),
  };
}

function readView(r: SectionReader, errors: ValidationMessage[], warnings: ValidationMessage[]): MapViewOptions {
  return {
    ...readBase(r, errors, warnings),
    center: r.read('center', isLatLng, '"center" must be [latitude, longitude] array with valid values'),
    zoom: r.read('zoom', numberBetween(0, 24), '"zoom" must be a number between 0 and 24'),
  };
}

function readMapLibre(r: SectionReader, errors: ValidationMessage[], warnings: ValidationMessage[]): MapLibreOptions {
  return {
    ...readView(r, errors, warnings),
    style: r.read('style', isStyleValue, '"style" must be a style name, URL or style object with version 8'),
    bearing: r.read('bearing', isNumber, '"bearing" must be a number'),
    pitch: r.read('pitch', numberBetween(0, 85), '"pitch" must be a number between 0 and 85'),
    antialias: r.read('antialias', isBoolean, '"antialias" must be a boolean'),
    controls: r.read('controls', isBoolean, '"controls" must be a boolean'),
    projection: r.read('projection', oneOf(VALID_GL_PROJECTIONS), `"projection" must be one of: ${VALID_GL_PROJECTIONS.join(', ')}`),
  };
}

function readMapbox(r: SectionReader, errors: ValidationMessage[], warnings: ValidationMessage[]): MapboxOptions {
  return {
    ...readView(r, errors, warnings),
    style: r.read('style', isStyleValue, '"style" must be a style URL or style object with version 8'),
    bearing: r.read('bearing', isNumber, '"bearing" must be a number'),
    pitch: r.read('pitch', numberBetween(0, 85), '"pitch" must be a number between 0 and 85'),
    antialias: r.read('antialias', isBoolean, '"antialias" must be a boolean'),
    controls: r.read('controls', isBoolean, '"controls" must be a boolean'),
    accessToken: r.read('accessToken', isString, '"accessToken" must be a string'),
    projection: r.read('projection', isString, '"projection" must be a projection name'),
  };
}

function readLeaflet(r: SectionReader, errors: ValidationMessage[], warnings: ValidationMessage[]): LeafletOptions {
  return {
    ...readView(r, errors, warnings),
    tileLayer: r.read('tileLayer', isString, '"tileLayer" must be a basemap name or URL template'),
    attribution: r.read('attribution', isString, '"attribution" must be a string'),
    mapOptions: r.read('mapOptions', isObject, '"mapOptions" must be an object'),
  };
}

function readOpenLayers(r: SectionReader, errors: ValidationMessage[], warnings: ValidationMessage[]): OpenLayersOptions {
  return {
    ...readView(r, errors, warnings),
    basemap: r.read('basemap', isString, '"basemap" must be a basemap name or URL template'),
    projection: r.read('projection', isString, '"projection" must be a projection code such as "EPSG:3857"'),
    rotation: r.read('rotation', isNumber, '"rotation" must be a number (radians)'),
    controls: r.read('controls', isBoolean, '"controls" must be a boolean'),
  };
}

function readCesium(r: SectionReader, errors: ValidationMessage[], warnings: ValidationMessage[]): CesiumOptions {
  return {
    ...readView(r, errors, warnings),
    cameraHeight: r.read('cameraHeight', numberBetween(1, Number.MAX_SAFE_INTEGER), '"cameraHeight" must be a positive number of meters'),
    heading: r.read('heading', isNumber, '"heading" must be a number (degrees)'),
    pitch: r.read('pitch', numberBetween(-90, 90), '"pitch" must be a number between -90 and 90'),
    roll: r.read('roll', isNumber, '"roll" must be a number (degrees)'),
    accessToken: r.read('accessToken', isString, '"accessToken" must be a string'),
    terrain: r.read('terrain', isTerrain, '"terrain" must be null or { type: "ellipsoid" | "world" | "url" }'),
  };
}

function readPotree(r: SectionReader, errors: ValidationMessage[], warnings: ValidationMessage[]): PotreeOptions {
  return {
    ...readBase(r, errors, warnings),
    potreeLibsDir: r.read('potreeLibsDir', isString, '"potreeLibsDir" must be a URL or path'),
    pointCloudUrl: r.read('pointCloudUrl', isString, '"pointCloudUrl" must be a URL'),
    description: r.read('description', isString, '"description" must be a string'),
    pointBudget: r.read('pointBudget', isPositiveInteger, '"pointBudget" must be a positive integer'),
    fov: r.read('fov', numberBetween(1, 179), '"fov" must be a number between 1 and 179'),
    edlEnabled: r.read('edlEnabled', isBoolean, '"edlEnabled" must be a boolean'),
    background: r.read('background', oneOf(VALID_POTREE_BACKGROUNDS), `"background" must be one of: ${VALID_POTREE_BACKGROUNDS.join(', ')}`),
  };
}

function readSection(
  backend: BackendName,
  section: Record<string, unknown>,
  path: string,
  errors: ValidationMessage[],
  warnings: ValidationMessage[],
  config: WidgetConfigFile
): void {
  checkUnknownKeys(section, KNOWN_KEYS[backend], path, warnings);
  const r = new SectionReader(section, path, errors);
  switch (backend) {
    case 'maplibre':
      config.maplibre = readMapLibre(r, errors, warnings);
      break;
    case 'deckgl':
      config.deckgl = readMapLibre(r, errors, warnings);
      break;
    case 'mapbox':
      config.mapbox = readMapbox(r, errors, warnings);
      break;
    case 'leaflet':
      config.leaflet = readLeaflet(r, errors, warnings);
      break;
    case 'openlayers':
      config.openlayers = readOpenLayers(r, errors, warnings);
      break;
    case 'cesium':
      config.cesium = readCesium(r, errors, warnings);
      break;
    case 'potree':
      config.potree = readPotree(r, errors, warnings);
      break;
  }
}

/**
 * Validates the options passed to one widget constructor.
 */
export function validateWidgetOptions(backend: BackendName, options: unknown): ValidationResult {
  const errors: ValidationMessage[] = [];
  const warnings: ValidationMessage[] = [];

  if (!isObject(options)) {
    errors.push({ severity: 'error', path: '', message: 'Options must be an object' });
    return { valid: false, errors, warnings };
  }

  readSection(backend, options, '', errors, warnings, {});

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

/**
 * Validates a widget config file: an object with one optional section per backend.
 */
export function validateWidgetConfigFile(config: unknown): ConfigFileValidationResult {
  const errors: ValidationMessage[] = [];
  const warnings: ValidationMessage[] = [];
  const parsed: WidgetConfigFile = {};

  if (!isObject(config)) {
    errors.push({ severity: 'error', path: '', message: 'Configuration must be an object' });
    return { valid: false, errors, warnings, config: parsed };
  }

  checkUnknownKeys(config, [...BACKEND_NAMES], '', warnings);

  for (const backend of BACKEND_NAMES) {
    const section = config[backend];
    if (section === undefined) continue;
    if (!isObject(section)) {
      errors.push({ severity: 'error', path: backend, message: `"${backend}" must be an object` });
      continue;
    }
    readSection(backend, section, backend, errors, warnings, parsed);
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
    config: parsed,
  };
}

/** Formats messages as "path: message" lines for error text and logs. */
export function formatValidationMessages(messages: ValidationMessage[]): string[] {
  return messages.map(m => (m.path ? `${m.path}: ${m.message}` : m.message));
}
