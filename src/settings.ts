import { z } from 'zod';

export const DEFAULT_SETTINGS = {
  function: 'x',
  from: 0,
  to: 10,
  samples: 501,
} as const;

export const MAX_SAMPLES = 100_000;

export const settingsSchema = z
  .object({
    function: z.string().default(DEFAULT_SETTINGS.function),
    from: z.number().finite().default(DEFAULT_SETTINGS.from),
    to: z.number().finite().default(DEFAULT_SETTINGS.to),
    samples: z.number().int().min(2).max(MAX_SAMPLES).default(DEFAULT_SETTINGS.samples),
  })
  .refine((settings) => settings.from < settings.to, {
    message: 'From is greater than To',
    path: ['from'],
  });

export type GrapherSettings = z.infer<typeof settingsSchema>;

export interface SettingsIssue {
  path: string;
  message: string;
}

export class SettingsError extends Error {
  constructor(public readonly issues: SettingsIssue[]) {
    super(`Invalid settings: ${issues.map((issue) => `${issue.path}: ${issue.message}`).join('; ')}`);
    this.name = 'SettingsError';
  }
}

/** Validates settings, filling in defaults for missing fields. */
export function parseSettings(input: unknown = {}): GrapherSettings {
  const result = settingsSchema.safeParse(input);
  if (!result.success) {
    throw new SettingsError(
      result.error.issues.map((issue) => ({
        path: issue.path.join('.') || '(root)',
        message: issue.message,
      }))
    );
  }
  return result.data;
}

export type LimitField = 'from' | 'to' | 'range';

export class LimitsError extends Error {
  constructor(
    public readonly field: LimitField,
    message: string
  ) {
    super(message);
    this.name = 'LimitsError';
  }
}

const limitSchema = z
  .string()
  .trim()
  .regex(/^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/)
  .transform((text) => Number(text))
  .pipe(z.number().finite());

const limitLabels: Record<'from' | 'to', string> = { from: 'From', to: 'To' };

function parseLimit(field: 'from' | 'to', text: string): number {
  const result = limitSchema.safeParse(text);
  if (!result.success) {
    throw new LimitsError(field, `${limitLabels[field]} is not a valid number`);
  }
  return result.data;
}

/** Parses the x-axis limits as typed by the user. */
export function parseLimits(fromText: string, toText: string): { from: number; to: number } {
  const from = parseLimit('from', fromText);
  const to = parseLimit('to', toText);
  if (from >= to) {
    throw new LimitsError('range', 'From is greater than To');
  }
  return { from, to };
}
