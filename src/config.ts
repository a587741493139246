/**
 * Codec configuration
 *
 * Validated with zod from CONSTRAINT_CODEC_* environment variables, with
 * explicit overrides taking precedence over the environment.
 */

import { z } from 'zod';

/**
 * Boolean coercion that handles string "false" and "true"
 */
const booleanString = z.union([z.boolean(), z.string(), z.number()]).transform((val) => {
  if (typeof val === 'boolean') return val;
  if (typeof val === 'number') return val !== 0;
  const lower = val.toLowerCase().trim();
  return !(lower === 'false' || lower === '0' || lower === '' || lower === 'no');
});

/**
 * Comma-separated list, or an array as given
 */
const stringList = z.union([z.array(z.string()), z.string()]).transform((val) =>
  (Array.isArray(val) ? val : val.split(','))
    .map((item) => item.trim())
    .filter((item) => item.length > 0)
);

const LogLevel = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

const ColumnsSchema = z.object({
  attachedAtom: z.string().default('_atom_site.calc_attached_atom'),
  constraintId: z.string().default('_atom_site.constraint_posn_id'),
  positionIndex: z.string().default('_atom_site.constraint_posn_index'),
  uisoMultiplier: z.string().default('_atom_site.calc_uiso_multiplier'),
  catalogueId: z.string().default('_constraint_posn.id'),
  catalogueRefinedPars: z.string().default('_constraint_posn.refined_pars'),
  catalogueInstruction: z.string().default('_constraint_posn.instruction'),
  scaleFactor: z.string().default('_shelx.scale_factor'),
});

export const ConfigSchema = z.object({
  logLevel: LogLevel.default('warn'),
  lineWidth: z.coerce.number().int().min(40).max(200).default(80),
  normalizeLabels: booleanString.default(true),
  multiplierDecimals: z.coerce.number().int().min(0).max(10).default(3),
  retainUnsupportedInstructions: booleanString.default(true),
  instructionItems: stringList
    .pipe(z.array(z.string()).min(1))
    .default(['_iucr.refine_instructions_details', '_shelx.res_file']),
  columns: ColumnsSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;
export type ColumnNames = Config['columns'];

export const ENV_PREFIX = 'CONSTRAINT_CODEC_';

function fromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const read = (key: string) => env[`${ENV_PREFIX}${key}`];
  const raw: Record<string, unknown> = {
    logLevel: read('LOG_LEVEL'),
    lineWidth: read('LINE_WIDTH'),
    normalizeLabels: read('NORMALIZE_LABELS'),
    multiplierDecimals: read('MULTIPLIER_DECIMALS'),
    retainUnsupportedInstructions: read('RETAIN_UNSUPPORTED_INSTRUCTIONS'),
    instructionItems: read('INSTRUCTION_ITEMS'),
  };
  // unset variables fall through to the schema defaults
  return Object.fromEntries(Object.entries(raw).filter(([, value]) => value !== undefined));
}

/**
 * Parse and validate configuration. Throws a ZodError on invalid values.
 */
export function loadConfig(overrides: ConfigInput = {}, env: NodeJS.ProcessEnv = process.env): Config {
  return ConfigSchema.parse({ ...fromEnv(env), ...overrides });
}
