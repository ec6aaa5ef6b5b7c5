import { z } from 'zod';

// Wire schemas for the catalog documents. Optional fields tolerate both a
// missing key and an explicit null, then fall back to the documented default.

const optionalString = z.string().nullish();

export const IndexEntrySchema = z.object({
  packID: optionalString,
  path: optionalString,
  slug: optionalString,
  title: optionalString,
  description: optionalString,
  descr: optionalString,
}).transform((e) => ({
  packID: e.packID ?? e.slug ?? e.path ?? '',
  path: e.path ?? e.slug ?? e.packID ?? '',
  title: e.title ?? undefined,
  description: e.description ?? e.descr ?? undefined,
}));

export const PackIndexSchema = z.object({
  schemaVersion: z.number().int(),
  packs: z.array(IndexEntrySchema).nullish().transform((packs) => packs ?? []),
});

export const PackScaleRefSchema = z.object({
  id: z.string(),
  title: z.string(),
  path: z.string(),
});

export const PackAuthorSchema = z.object({
  name: z.string(),
  url: optionalString.transform((u) => u ?? undefined),
});

export const PackSchema = z.object({
  schemaVersion: z.number().int(),
  packID: optionalString.transform((v) => v ?? ''),
  title: optionalString.transform((v) => v ?? 'Untitled Pack'),
  version: optionalString.transform((v) => v ?? '0'),
  date: optionalString.transform((v) => v ?? ''),
  license: optionalString.transform((v) => v ?? ''),
  author: PackAuthorSchema.nullish().transform((a) => a ?? { name: 'Unknown', url: undefined }),
  description: optionalString.transform((v) => v ?? ''),
  scales: z.array(PackScaleRefSchema).nullish().transform((s) => s ?? []),
});

// Exponent vector keyed by prime. Accepts an object ({"3": 1}) or a flat
// alternating array ([3, 1, 5, -1]) and normalises to the object form.
export const MonzoSchema = z
  .union([
    z.record(z.string().regex(/^-?\d+$/, 'monzo keys must be integers'), z.number().int()),
    z.array(z.number().int()),
  ])
  .transform((raw, ctx) => {
    if (!Array.isArray(raw)) return raw;
    if (raw.length % 2 !== 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'monzo array must hold prime/exponent pairs' });
      return z.NEVER;
    }
    const out: Record<string, number> = {};
    for (let i = 0; i < raw.length; i += 2) out[String(raw[i])] = raw[i + 1] ?? 0;
    return out;
  });

export const RatioRefSchema = z.object({
  p: z.number().int(),
  q: z.number().int(),
  octave: z.number().int().default(0),
  monzo: MonzoSchema.default({}),
});

export const ScalePayloadSchema = z.object({
  refs: z.array(RatioRefSchema),
  title: z.string().optional(),
  notes: z.string().optional(),
  rootHz: z.number().optional(),
  primeLimit: z.number().int().optional(),
}).passthrough();

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Envelopes are written either nested ({ schemaVersion, payload: {...} })
// or flat, with the payload fields beside schemaVersion.
export const ScaleEnvelopeSchema = z.preprocess(
  (raw) => {
    if (!isRecord(raw) || 'payload' in raw) return raw;
    const { schemaVersion, ...payload } = raw;
    return { schemaVersion, payload };
  },
  z.object({
    schemaVersion: z.number().int(),
    payload: ScalePayloadSchema,
  }),
);

export type PackIndexEntry = z.infer<typeof IndexEntrySchema>;
export type PackIndex = z.infer<typeof PackIndexSchema>;
export type PackScaleRef = z.infer<typeof PackScaleRefSchema>;
export type PackDocument = z.infer<typeof PackSchema>;
export type RatioRef = z.infer<typeof RatioRefSchema>;
export type ScalePayload = z.infer<typeof ScalePayloadSchema>;
export type ScaleEnvelope = z.infer<typeof ScaleEnvelopeSchema>;
