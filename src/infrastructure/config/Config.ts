import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { TIME_WINDOWS, type TimeWindow } from '../../domain/entities/Signal.js';

const projectRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../..');

export interface AppConfig {
  server: {
    port: number;
  };
  pipeline: {
    timeWindows: TimeWindow[];
    asOf?: string;
  };
  matching: {
    educationMin: number;
    educationMax: number;
    offerMax: number;
  };
  data: {
    catalogDir: string;
    ledgerSeedPath: string | null;
  };
}

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EnvSchema = z
  .object({
    PORT: positiveInt(4000),
    PIPELINE_TIME_WINDOWS: z
      .string()
      .default('30d,180d')
      .transform((value) => value.split(',').map((entry) => entry.trim()).filter((entry) => entry.length > 0))
      .pipe(z.array(z.enum(TIME_WINDOWS)).min(1)),
    PIPELINE_AS_OF: z
      .string()
      .regex(/^\d{4}-\d{2}-\d{2}$/, 'PIPELINE_AS_OF must be YYYY-MM-DD')
      .optional(),
    EDUCATION_MIN_ITEMS: positiveInt(3),
    EDUCATION_MAX_ITEMS: positiveInt(5),
    OFFER_MAX_ITEMS: positiveInt(3),
    CATALOG_DIR: z.string().min(1).default(path.join(projectRoot, 'data/catalog')),
    LEDGER_SEED_PATH: z.string().default(path.join(projectRoot, 'data/demo/ledger.json')),
  })
  .refine((env) => env.EDUCATION_MIN_ITEMS <= env.EDUCATION_MAX_ITEMS, {
    message: 'EDUCATION_MIN_ITEMS cannot exceed EDUCATION_MAX_ITEMS',
    path: ['EDUCATION_MIN_ITEMS'],
  });

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = EnvSchema.parse(env);

  return {
    server: {
      port: parsed.PORT,
    },
    pipeline: {
      timeWindows: [...new Set(parsed.PIPELINE_TIME_WINDOWS)],
      asOf: parsed.PIPELINE_AS_OF,
    },
    matching: {
      educationMin: parsed.EDUCATION_MIN_ITEMS,
      educationMax: parsed.EDUCATION_MAX_ITEMS,
      offerMax: parsed.OFFER_MAX_ITEMS,
    },
    data: {
      catalogDir: path.resolve(parsed.CATALOG_DIR),
      ledgerSeedPath: parsed.LEDGER_SEED_PATH.trim() === '' ? null : path.resolve(parsed.LEDGER_SEED_PATH),
    },
  };
};
