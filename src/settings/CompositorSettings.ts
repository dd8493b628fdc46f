import type { CappedLayerKind } from "../types";

export interface CompositorSettings {
  // Capacity policy, enforced by the creating collaborator via checkLayerCapacity()
  maxCastLayers: number;
  maxTextLayers: number;

  // Skip layers hidden behind an opaque, visible upper layer
  occlusionCulling: boolean;

  // Report not-found lookups and removals on console.debug
  debugLogging: boolean;
}

export const DEFAULT_COMPOSITOR_SETTINGS: CompositorSettings = {
  maxCastLayers: 1024,
  maxTextLayers: 256,
  occlusionCulling: true,
  debugLogging: false,
};

function isPositiveInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0;
}

/**
 * Merge loaded data with defaults, ensuring all fields exist.
 * Unknown keys are dropped; invalid values fall back to the default.
 */
export function mergeSettings(loaded: Partial<CompositorSettings> | null | undefined): CompositorSettings {
  const merged = { ...DEFAULT_COMPOSITOR_SETTINGS };
  if (!loaded) return merged;

  if (isPositiveInteger(loaded.maxCastLayers)) merged.maxCastLayers = loaded.maxCastLayers;
  if (isPositiveInteger(loaded.maxTextLayers)) merged.maxTextLayers = loaded.maxTextLayers;
  if (typeof loaded.occlusionCulling === "boolean") merged.occlusionCulling = loaded.occlusionCulling;
  if (typeof loaded.debugLogging === "boolean") merged.debugLogging = loaded.debugLogging;

  return merged;
}

export function layerLimit(settings: CompositorSettings, kind: CappedLayerKind): number {
  return kind === "cast" ? settings.maxCastLayers : settings.maxTextLayers;
}
