import { readFileSync } from "node:fs";
import { z } from "zod";

/** Feature bit flags; test with `hasFeature`. */
export const LightFeature = {
  NONE: 0,
  COLOR_RGB: 1 << 0,
  COLOR_KELVIN_TEMPERATURE: 1 << 1,
  BRIGHTNESS: 1 << 2,
  SEGMENT_CONTROL: 1 << 3,
  SCENES: 1 << 4,
} as const;

export type LightFeatureName = Exclude<keyof typeof LightFeature, "NONE">;

export type LightCapabilities = Readonly<{
  features: number;
  /** Segment selector codes, index 0 is segment 1. */
  segments: ReadonlyArray<Uint8Array>;
  /** Lower-case scene name to scene code. */
  scenes: ReadonlyMap<string, Uint8Array>;
}>;

export type CapabilityLookup = (sku: string) => LightCapabilities | undefined;

export const ON_OFF_CAPABILITIES: LightCapabilities = Object.freeze({
  features: LightFeature.NONE,
  segments: Object.freeze([]),
  scenes: new Map<string, Uint8Array>(),
});

export function hasFeature(capabilities: LightCapabilities, feature: number): boolean {
  return (capabilities.features & feature) === feature;
}

const featureNameSchema = z.enum([
  "COLOR_RGB",
  "COLOR_KELVIN_TEMPERATURE",
  "BRIGHTNESS",
  "SEGMENT_CONTROL",
  "SCENES",
]);

const hexCode = z.string().regex(/^(?:[0-9a-fA-F]{2})+$/);

const tableSchema = z.object({
  sceneSets: z.record(z.record(hexCode)),
  segmentLayouts: z.record(z.array(hexCode)),
  models: z.record(
    z.object({
      features: z.array(featureNameSchema),
      segments: z.string().optional(),
      scenes: z.string().optional(),
    }),
  ),
});

function toBytes(hex: string): Uint8Array {
  return Uint8Array.from(Buffer.from(hex, "hex"));
}

export function parseCapabilityTable(raw: unknown): ReadonlyMap<string, LightCapabilities> {
  const table = tableSchema.parse(raw);
  const models = new Map<string, LightCapabilities>();

  for (const [sku, model] of Object.entries(table.models)) {
    let segments: Uint8Array[] = [];
    if (model.segments) {
      const layout = table.segmentLayouts[model.segments];
      if (!layout) throw new Error(`Model ${sku} references unknown segment layout ${model.segments}`);
      segments = layout.map(toBytes);
    }

    const scenes = new Map<string, Uint8Array>();
    if (model.scenes) {
      const set = table.sceneSets[model.scenes];
      if (!set) throw new Error(`Model ${sku} references unknown scene set ${model.scenes}`);
      for (const [name, code] of Object.entries(set)) scenes.set(name.toLowerCase(), toBytes(code));
    }

    const features = model.features.reduce<number>((acc, name) => acc | LightFeature[name], 0);
    models.set(sku, Object.freeze({ features, segments: Object.freeze(segments), scenes }));
  }

  return models;
}

const TABLE_URL = new URL("../../data/capabilities.json", import.meta.url);

export const CAPABILITY_TABLE: ReadonlyMap<string, LightCapabilities> = parseCapabilityTable(
  JSON.parse(readFileSync(TABLE_URL, "utf8")),
);

export const lookupCapabilities: CapabilityLookup = (sku) => CAPABILITY_TABLE.get(sku);
