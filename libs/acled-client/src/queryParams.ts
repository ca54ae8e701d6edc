import { z } from 'zod';
import { AcledValidationError } from './types';
import type { QueryParamValue, QueryParams } from './types';

// ============================================================================
// Query Schema
// ============================================================================

export const WHERE_OPERATORS = ['=', '>', '<', 'BETWEEN', 'LIKE'] as const;
export type WhereOperator = (typeof WHERE_OPERATORS)[number];

export const DEFAULT_LIMIT = 5000;

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
const ISO_DATE_OR_RANGE = /^\d{4}-\d{2}-\d{2}(\|\d{4}-\d{2}-\d{2})?$/;
const YEAR_OR_RANGE = /^\d{4}(\|\d{4})?$/;
const COUNT_OR_RANGE = /^\d+(\|\d+)?$/;

const withMessage = (message: string) => ({ errorMap: () => ({ message }) });

const text = (field: string) => z.string(withMessage(`\`${field}\` must be a string.`)).optional();

const code = (field: string) =>
  z
    .union([z.number(), z.string()], withMessage(`\`${field}\` must be a number or a string.`))
    .optional();

const where = (field: string) =>
  z.enum(WHERE_OPERATORS, withMessage(`\`${field}\` must be one of: ${WHERE_OPERATORS.join(', ')}`)).optional();

const precision = (field: string) =>
  z
    .number(withMessage(`\`${field}\` must be numeric (1, 2, or 3).`))
    .refine((value) => value === 1 || value === 2 || value === 3, `\`${field}\` must be numeric (1, 2, or 3).`)
    .optional();

/**
 * Filters accepted by the ACLED `read` endpoint.
 *
 * Text filters default to LIKE matching server side, numeric ones to `=`; the
 * `*Where` fields override the operator for their sibling filter.
 */
export const acledQuerySchema = z
  .object({
    // Event identifiers
    eventIdCnty: text('eventIdCnty'),
    eventDate: z
      .string(withMessage('`eventDate` must be in YYYY-MM-DD format or YYYY-MM-DD|YYYY-MM-DD for ranges.'))
      .regex(ISO_DATE_OR_RANGE)
      .optional(),
    year: z
      .union([z.number(), z.string()], withMessage('`year` must be a string or a number.'))
      .transform((value) => String(value))
      .pipe(z.string().regex(YEAR_OR_RANGE, '`year` must be in YYYY format or YYYY|YYYY for ranges.'))
      .optional(),
    timePrecision: precision('timePrecision'),

    // Event classification
    disorderType: text('disorderType'),
    eventType: text('eventType'),
    subEventType: text('subEventType'),

    // Actors
    actor1: text('actor1'),
    assocActor1: text('assocActor1'),
    inter1: code('inter1'),
    actor2: text('actor2'),
    assocActor2: text('assocActor2'),
    inter2: code('inter2'),
    interaction: code('interaction'),
    interNum: z
      .number(withMessage('`interNum` must be 0 or 1.'))
      .refine((value) => value === 0 || value === 1, '`interNum` must be 0 or 1.')
      .optional(),
    civilianTargeting: text('civilianTargeting'),

    // Geography
    iso: code('iso'),
    region: code('region'),
    country: text('country'),
    admin1: text('admin1'),
    admin2: text('admin2'),
    admin3: text('admin3'),
    location: text('location'),
    latitude: z.number(withMessage('`latitude` must be numeric.')).optional(),
    longitude: z.number(withMessage('`longitude` must be numeric.')).optional(),
    geoPrecision: precision('geoPrecision'),

    // Sources and notes
    source: text('source'),
    sourceScale: text('sourceScale'),
    notes: text('notes'),

    // Impact and metadata
    fatalities: z
      .union(
        [z.number(), z.string().regex(COUNT_OR_RANGE, '`fatalities` must be a number or a N|N range.')],
        withMessage('`fatalities` must be a number or a N|N range.'),
      )
      .optional(),
    tags: text('tags'),
    timestamp: z
      .union(
        [
          z.number(),
          z.string(withMessage('`timestamp` must be numeric or a date string (YYYY-MM-DD).')).regex(ISO_DATE),
        ],
        withMessage('`timestamp` must be numeric or a date string (YYYY-MM-DD).'),
      )
      .optional(),
    exportType: z.enum(['dyadic', 'monadic'], withMessage("`exportType` must be 'dyadic' or 'monadic'.")).optional(),
    population: z.enum(['TRUE', 'full'], withMessage("`population` must be 'TRUE' or 'full'.")).optional(),

    // Comparison operator overrides
    eventDateWhere: where('eventDateWhere'),
    yearWhere: where('yearWhere'),
    fatalitiesWhere: where('fatalitiesWhere'),
    timestampWhere: where('timestampWhere'),
    admin1Where: where('admin1Where'),
    admin2Where: where('admin2Where'),
    admin3Where: where('admin3Where'),

    // Paging and column selection
    fields: z
      .union([z.string(), z.array(z.string())], withMessage('`fields` must be a string or an array of strings.'))
      .transform((value) => (Array.isArray(value) ? value.join('|') : value))
      .optional(),
    limit: z
      .number(withMessage('`limit` must be a positive number.'))
      .min(1)
      .default(DEFAULT_LIMIT),
  })
  .strict();

export type AcledQueryParams = z.input<typeof acledQuerySchema> & {
  /** Only `json` is supported; anything else is coerced with a warning. */
  format?: string;
};

export type AcledQuery = z.output<typeof acledQuerySchema>;

/** camelCase filter name to the parameter name the API expects. */
export const ACLED_WIRE_NAMES = {
  eventIdCnty: 'event_id_cnty',
  eventDate: 'event_date',
  year: 'year',
  timePrecision: 'time_precision',
  disorderType: 'disorder_type',
  eventType: 'event_type',
  subEventType: 'sub_event_type',
  actor1: 'actor1',
  assocActor1: 'assoc_actor_1',
  inter1: 'inter1',
  actor2: 'actor2',
  assocActor2: 'assoc_actor_2',
  inter2: 'inter2',
  interaction: 'interaction',
  interNum: 'inter_num',
  civilianTargeting: 'civilian_targeting',
  iso: 'iso',
  region: 'region',
  country: 'country',
  admin1: 'admin1',
  admin2: 'admin2',
  admin3: 'admin3',
  location: 'location',
  latitude: 'latitude',
  longitude: 'longitude',
  geoPrecision: 'geo_precision',
  source: 'source',
  sourceScale: 'source_scale',
  notes: 'notes',
  fatalities: 'fatalities',
  tags: 'tags',
  timestamp: 'timestamp',
  exportType: 'export_type',
  population: 'population',
  eventDateWhere: 'event_date_where',
  yearWhere: 'year_where',
  fatalitiesWhere: 'fatalities_where',
  timestampWhere: 'timestamp_where',
  admin1Where: 'admin1_where',
  admin2Where: 'admin2_where',
  admin3Where: 'admin3_where',
  fields: 'fields',
  limit: 'limit',
} as const satisfies Record<keyof AcledQuery, string>;

const WIRE_NAME_LOOKUP = new Map<string, string>(Object.entries(ACLED_WIRE_NAMES));

// ============================================================================
// Validation
// ============================================================================

export const FORMAT_COERCION_WARNING = "Only 'json' is supported for parsing; coercing `format` to 'json'.";

export type AcledQueryValidation =
  | { success: true; query: AcledQuery; warnings: string[] }
  | { success: false; error: AcledValidationError; warnings: string[] };

/**
 * Validate a token and a set of filters without touching the network.
 *
 * Accepts untyped input so callers holding parsed JSON or CLI arguments can
 * check it before building a request. The first failing field is reported.
 */
export function validateAcledQuery(accessToken: unknown, params: unknown = {}): AcledQueryValidation {
  const warnings: string[] = [];

  if (typeof accessToken !== 'string' || accessToken.trim() === '') {
    return {
      success: false,
      error: new AcledValidationError('accessToken', '`accessToken` must be a non-empty string.'),
      warnings,
    };
  }

  if (typeof params !== 'object' || params === null || Array.isArray(params)) {
    return {
      success: false,
      error: new AcledValidationError('params', 'Query parameters must be an object.'),
      warnings,
    };
  }

  const filters: Record<string, unknown> = { ...params };
  const format = filters.format;
  delete filters.format;
  if (format !== undefined && format !== 'json') {
    warnings.push(FORMAT_COERCION_WARNING);
  }

  const parsed = acledQuerySchema.safeParse(filters);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field =
      issue?.code === 'unrecognized_keys' ? issue.keys.join(', ') : String(issue?.path[0] ?? 'params');
    return {
      success: false,
      error: new AcledValidationError(field, issue?.message ?? 'Invalid query parameters.'),
      warnings,
    };
  }

  return { success: true, query: parsed.data, warnings };
}

// ============================================================================
// Request Construction
// ============================================================================

/**
 * Map a validated query onto wire parameters for one page.
 *
 * The token travels in `key` as well as the Authorization header; older ACLED
 * deployments only read the query string.
 */
export function buildAcledQuery(accessToken: string, query: AcledQuery, page: number): QueryParams {
  const params: QueryParams = {
    _format: 'json',
    key: accessToken,
    page,
  };

  const entries: Array<[string, QueryParamValue | undefined]> = Object.entries(query);
  for (const [field, value] of entries) {
    const wireName = WIRE_NAME_LOOKUP.get(field);
    if (wireName === undefined || value === undefined) {
      continue;
    }
    params[wireName] = value;
  }

  return params;
}
