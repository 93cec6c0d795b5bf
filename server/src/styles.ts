import { readFileSync } from 'node:fs';
import { z } from 'zod';

import type { StyleEffect, StyleId } from './types.js';

export const DEFAULT_STYLES_PATH = new URL('../config/styles.json', import.meta.url);

const multiplier = z.number().finite().positive();

export const StyleEntrySchema = z
  .object({
    id: z.string().min(1),
    label: z.string().min(1),
    selfHitMult: multiplier.default(1),
    selfCritMult: multiplier.default(1),
    selfRollCapDelta: z.number().int().default(0),
    opponentHitMult: multiplier.default(1),
    winPushMult: multiplier.default(1),
    loseOpponentPushMult: multiplier.default(1),
    feintTiebreak: z.boolean().default(false)
  })
  .strict();

export const StyleCatalogSchema = z
  .object({
    default: z.string().min(1),
    styles: z.array(StyleEntrySchema).min(1)
  })
  .strict()
  .superRefine((catalog, ctx) => {
    const seen = new Set<string>();
    for (const [index, style] of catalog.styles.entries()) {
      if (seen.has(style.id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['styles', index, 'id'], message: `duplicate style id ${style.id}` });
      }
      seen.add(style.id);
    }
    if (!seen.has(catalog.default)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['default'], message: `default style ${catalog.default} is not in the catalog` });
    }
  });

type AssertStyleEffect = z.infer<typeof StyleEntrySchema> extends StyleEffect ? true : never;
const _assertStyleEffect: AssertStyleEffect = true;
void _assertStyleEffect;

/** Immutable lookup table of styles. Built once, then only read. */
export class StyleCatalog {
  readonly defaultStyle: StyleEffect;
  private readonly byId: ReadonlyMap<StyleId, StyleEffect>;

  private constructor(styles: StyleEffect[], defaultId: StyleId) {
    this.byId = new Map(styles.map((style) => [style.id, Object.freeze({ ...style })]));
    const fallback = this.byId.get(defaultId);
    if (!fallback) {
      throw new Error(`Default style ${defaultId} missing from catalog`);
    }
    this.defaultStyle = fallback;
  }

  static fromData(data: unknown): StyleCatalog {
    const parsed = StyleCatalogSchema.parse(data);
    return new StyleCatalog(parsed.styles, parsed.default);
  }

  static load(path: string | URL = DEFAULT_STYLES_PATH): StyleCatalog {
    const raw: unknown = JSON.parse(readFileSync(path, 'utf8'));
    return StyleCatalog.fromData(raw);
  }

  lookup(id: StyleId): StyleEffect | undefined {
    return this.byId.get(id);
  }

  has(id: StyleId): boolean {
    return this.byId.has(id);
  }

  ids(): StyleId[] {
    return [...this.byId.keys()];
  }
}
