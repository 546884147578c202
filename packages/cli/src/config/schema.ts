/**
 * Input file schemas
 *
 * Market data arrives as flat row tables; the engine configuration file
 * holds partial overrides of the defaults.
 */

import { z } from 'zod';
import type { PositioningObservation, PriceObservation, YieldObservation } from '@fx-regime/engine';

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');
const priceSign = z.union([z.literal(1), z.literal(-1)]);

export const YieldRowSchema = z.object({
  instrumentId: z.string().min(1),
  date: isoDate,
  value: z.number().finite(),
}) satisfies z.ZodType<YieldObservation>;

export const PriceRowSchema = z.object({
  pairId: z.string().min(1),
  date: isoDate,
  price: z.number().finite(),
}) satisfies z.ZodType<PriceObservation>;

export const PositioningRowSchema = z.object({
  pairId: z.string().min(1),
  category: z.string().min(1),
  date: isoDate,
  netContracts: z.number().finite(),
  openInterest: z.number().finite(),
  longContracts: z.number().finite().optional(),
  shortContracts: z.number().finite().optional(),
}) satisfies z.ZodType<PositioningObservation & { category: string }>;

export const VolatilitySignalRowSchema = z.object({
  pairId: z.string().min(1),
  date: isoDate,
  value: z.number().finite(),
});

export const MarketDataFileSchema = z.object({
  yields: z.array(YieldRowSchema),
  prices: z.array(PriceRowSchema),
  positioning: z.array(PositioningRowSchema),
  volatilitySignals: z.array(VolatilitySignalRowSchema).optional(),
});

const CalendarPeriodSchema = z.object({
  label: z.string().min(1),
  unit: z.enum(['days', 'months']),
  amount: z.number().int(),
});

export const EngineConfigFileSchema = z
  .object({
    spreads: z
      .array(z.object({ spreadId: z.string().min(1), minuend: z.string().min(1), subtrahend: z.string().min(1) }))
      .optional(),
    pairs: z
      .array(
        z.object({
          pairId: z.string().min(1),
          trendSpreadId: z.string().min(1),
          spreadIds: z.array(z.string().min(1)),
          spreadPriceSign: priceSign,
          positioningPriceSign: priceSign,
        })
      )
      .optional(),
    positioning: z
      .object({
        windowSize: z.number().int(),
        minObservations: z.number().int(),
        metric: z.enum(['netContracts', 'netPctOpenInterest']),
        primaryCategory: z.string().min(1),
        divergenceCategory: z.string().min(1).nullable(),
        maxLagDays: z.number().int().nonnegative(),
      })
      .partial()
      .strict()
      .optional(),
    classifier: z
      .object({
        lookback: CalendarPeriodSchema,
        highCrowding: z.number(),
        lowCrowding: z.number(),
        spreadFlatThreshold: z.number(),
        crisisThreshold: z.number().nullable(),
        maxStaleDays: z.number().int().nonnegative(),
      })
      .partial()
      .strict()
      .optional(),
    deltaPeriods: z.array(CalendarPeriodSchema).optional(),
    snapshot: z
      .object({
        spreadIds: z.array(z.string().min(1)),
        instrumentIds: z.array(z.string().min(1)),
      })
      .partial()
      .strict()
      .optional(),
    volatility: z
      .object({
        window: z.number().int(),
        annualizationDays: z.number().positive(),
        rankWindow: z.number().int().positive(),
        rankMinObservations: z.number().int().positive(),
        elevated: z.number(),
        extreme: z.number(),
      })
      .partial()
      .strict()
      .optional(),
  })
  .strict();

export type MarketDataFile = z.infer<typeof MarketDataFileSchema>;
export type PositioningRow = z.infer<typeof PositioningRowSchema>;
export type EngineConfigFile = z.infer<typeof EngineConfigFileSchema>;
