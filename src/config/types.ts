import type { z } from 'zod';
import type { costwardenConfigSchema } from './schema.js';

/** Validated configuration with every default applied. */
export type CostwardenConfig = z.output<typeof costwardenConfigSchema>;

/** Configuration as written in a file, before defaults. */
export type CostwardenConfigInput = z.input<typeof costwardenConfigSchema>;
