import { z } from 'zod';
import type { InstructionCategory } from './types';

const sizeSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive()
});

export const layoutConfigSchema = z
  .object({
    leftRailX: z.number().int().min(0),
    rightRailMinX: z.number().int().min(0),
    railOffset: z.number().int().positive(),
    elementSpacing: z.number().int().min(0),
    minimumWireLength: z.number().int().min(0),
    branchSpacing: z.number().int().positive(),
    rungPadding: z.number().int().min(0),
    commentLineHeight: z.number().int().min(0),
    routineOriginY: z.number().int().min(0),
    rungGap: z.number().int().min(0),
    sizes: z.object({
      contact: sizeSchema,
      coil: sizeSchema,
      block: sizeSchema,
      branchMarker: sizeSchema
    })
  })
  .refine(config => config.railOffset >= config.sizes.branchMarker.width, {
    message: 'railOffset must leave room for the branch marker',
    path: ['railOffset']
  })
  .refine(config => config.branchSpacing >= Math.max(...Object.values(config.sizes).map(size => size.height)), {
    message: 'branchSpacing must fit the tallest element',
    path: ['branchSpacing']
  });

export type LayoutConfig = z.infer<typeof layoutConfigSchema>;

export type ElementSize = LayoutConfig['sizes']['contact'];

export interface LayoutConfigOverrides extends Partial<Omit<LayoutConfig, 'sizes'>> {
  sizes?: Partial<LayoutConfig['sizes']>;
}

export const DEFAULT_LAYOUT_CONFIG: LayoutConfig = {
  leftRailX: 40,
  rightRailMinX: 600,
  railOffset: 20,
  elementSpacing: 10,
  minimumWireLength: 10,
  branchSpacing: 60,
  rungPadding: 10,
  commentLineHeight: 15,
  routineOriginY: 50,
  rungGap: 20,
  sizes: {
    contact: { width: 40, height: 30 },
    coil: { width: 40, height: 30 },
    block: { width: 80, height: 40 },
    branchMarker: { width: 10, height: 30 }
  }
};

export function resolveLayoutConfig(overrides: LayoutConfigOverrides = {}): LayoutConfig {
  const { sizes, ...scalars } = overrides;
  return layoutConfigSchema.parse({
    ...DEFAULT_LAYOUT_CONFIG,
    ...scalars,
    sizes: { ...DEFAULT_LAYOUT_CONFIG.sizes, ...sizes }
  });
}

export function sizeForCategory(config: LayoutConfig, category: InstructionCategory): ElementSize {
  return config.sizes[category];
}

type ScalarKey = Exclude<keyof LayoutConfig, 'sizes'>;

const ENV_KEYS: ReadonlyArray<[string, ScalarKey]> = [
  ['LADDER_LEFT_RAIL_X', 'leftRailX'],
  ['LADDER_RIGHT_RAIL_MIN_X', 'rightRailMinX'],
  ['LADDER_RAIL_OFFSET', 'railOffset'],
  ['LADDER_ELEMENT_SPACING', 'elementSpacing'],
  ['LADDER_MIN_WIRE_LENGTH', 'minimumWireLength'],
  ['LADDER_BRANCH_SPACING', 'branchSpacing'],
  ['LADDER_RUNG_PADDING', 'rungPadding'],
  ['LADDER_COMMENT_LINE_HEIGHT', 'commentLineHeight'],
  ['LADDER_ORIGIN_Y', 'routineOriginY'],
  ['LADDER_RUNG_GAP', 'rungGap']
];

const envNumber = z.coerce.number().int();

export function layoutConfigFromEnv(env: NodeJS.ProcessEnv = process.env): LayoutConfigOverrides {
  const overrides: LayoutConfigOverrides = {};
  for (const [name, key] of ENV_KEYS) {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') {
      continue;
    }
    const parsed = envNumber.safeParse(raw);
    if (!parsed.success) {
      throw new Error(`${name} must be an integer, got '${raw}'.`);
    }
    overrides[key] = parsed.data;
  }
  return overrides;
}
