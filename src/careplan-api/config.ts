import 'dotenv/config';
import path from 'path';

export const config = {
  port: parseInt(process.env.PORT || '3002', 10),
  nodeEnv: process.env.NODE_ENV || 'development',
  clientUrl: process.env.CLIENT_URL || 'http://localhost:5174',
  carePackDir: path.resolve(process.env.CARE_PACK_DIR || 'care-packs/national-2025-v1'),
  advisory: {
    timeoutMs: parseInt(process.env.ADVISORY_TIMEOUT_MS || '4000', 10),
  },
  costCache: {
    ttlMs: parseInt(process.env.COST_CACHE_TTL_MS || String(30 * 60 * 1000), 10),
  },
  gates: {
    mcBehaviorGate: (process.env.MC_BEHAVIOR_GATE || 'off') === 'on',
  },
  isDev: (process.env.NODE_ENV || 'development') === 'development',
  isProd: process.env.NODE_ENV === 'production',
} as const;
