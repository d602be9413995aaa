/**
 * Plant Catalog
 *
 * Predefined plants for quick experiments, keyed by a string-literal
 * union so that an unknown id is a compile error rather than a lookup
 * miss.
 */

import type { PlantModel } from '../types/plants.js';
import { buildPlant } from './plants.js';
import type { TransferFunction } from './transfer-function.js';

export interface CatalogEntry {
  readonly name: string;
  readonly description: string;
  readonly model: PlantModel;
}

export const PLANT_CATALOG = {
  'first-order-fast': {
    name: 'Fast first-order',
    description: 'First-order lag with τ = 0.5 s',
    model: { kind: 'first-order', tau: 0.5 },
  },
  'first-order-slow': {
    name: 'Slow first-order',
    description: 'First-order lag with τ = 3.0 s',
    model: { kind: 'first-order', tau: 3.0 },
  },
  underdamped: {
    name: 'Underdamped second-order',
    description: 'ζ = 0.3, ωn = 1.0 rad/s',
    model: { kind: 'second-order', wn: 1.0, zeta: 0.3 },
  },
  'critically-damped': {
    name: 'Critically damped second-order',
    description: 'ζ = 1.0, ωn = 1.0 rad/s',
    model: { kind: 'second-order', wn: 1.0, zeta: 1.0 },
  },
  overdamped: {
    name: 'Overdamped second-order',
    description: 'ζ = 2.0, ωn = 1.0 rad/s',
    model: { kind: 'second-order', wn: 1.0, zeta: 2.0 },
  },
  integrator: {
    name: 'Pure integrator',
    description: '1/s, needs integral action to reject load disturbances',
    model: { kind: 'integrator', k: 1.0 },
  },
  'delayed-first-order': {
    name: 'First-order with dead time',
    description: 'First-order lag (τ = 1.0 s) with a 0.5 s delay',
    model: { kind: 'delayed-first-order', delay: 0.5, tau: 1.0 },
  },
  'high-order': {
    name: 'High-order',
    description: 'Fifth-order plant with a complex pole pair',
    model: {
      kind: 'high-order',
      poles: [-1, -2, -3, { re: -0.5, im: 1 }, { re: -0.5, im: -1 }],
    },
  },
} as const satisfies Record<string, CatalogEntry>;

export type PlantCatalogId = keyof typeof PLANT_CATALOG;

export const PLANT_CATALOG_IDS = Object.freeze(
  Object.keys(PLANT_CATALOG).filter(isPlantCatalogId)
);

export function isPlantCatalogId(value: string): value is PlantCatalogId {
  return Object.prototype.hasOwnProperty.call(PLANT_CATALOG, value);
}

export interface CatalogPlant {
  id: PlantCatalogId;
  name: string;
  description: string;
  transferFunction: TransferFunction;
}

/**
 * Build a catalog plant
 */
export function catalogPlant(id: PlantCatalogId): CatalogPlant {
  const entry: CatalogEntry = PLANT_CATALOG[id];
  return {
    id,
    name: entry.name,
    description: entry.description,
    transferFunction: buildPlant(entry.model),
  };
}
