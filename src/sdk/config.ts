import { z } from 'zod';
import type { DatasetFetchConfig } from '../types.js';
import { CONFIG_DEFAULTS } from '../types.js';
import type { FormAdapter, FormAdapterName } from '../auth/adapters.js';

/**
 * Error thrown for invalid configuration or site profiles.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const httpUrl = z
  .string()
  .trim()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), { message: 'must be an http(s) URL' });

const adapterName = z.enum(['generic', 'wordpress']) satisfies z.ZodType<FormAdapterName>;

function isFormAdapter(value: unknown): value is FormAdapter {
  return (
    typeof value === 'object' &&
    value !== null &&
    'selectLoginForm' in value &&
    'buildLoginFields' in value &&
    'selectTermsForm' in value &&
    'buildTermsFields' in value
  );
}

const keywordList = z.array(z.string().min(1));
const extensionList = z.array(z.string().regex(/^\.[A-Za-z0-9]+$/, 'extensions look like ".zip"'));
const nonNegativeInt = z.number().int().min(0);

/**
 * Schema for the scalar parts of a user-supplied config. Callbacks and the
 * abort signal pass through unchecked.
 */
export const userConfigSchema = z
  .object({
    url: httpUrl,
    seeds: z.array(httpUrl).optional(),
    maxDepth: nonNegativeInt.optional(),
    maxPages: z.number().int().positive().optional(),
    pageKeywords: keywordList.optional(),
    downloadKeywords: keywordList.optional(),
    termsPagePatterns: keywordList.optional(),
    fileExtensions: extensionList.optional(),
    outputDir: z.string().min(1).optional(),
    outputStructure: z.enum(['mirror', 'flat']).optional(),
    skipExisting: z.boolean().optional(),
    htmlSizeThreshold: nonNegativeInt.optional(),
    credentials: z.object({ username: z.string().min(1), password: z.string() }).optional(),
    loginUrl: httpUrl.optional(),
    formAdapter: z
      .union([adapterName, z.custom<FormAdapter>(isFormAdapter, 'must be an adapter name or a FormAdapter')])
      .optional(),
    postLoginFragments: keywordList.optional(),
    cookieFile: z.string().min(1).optional(),
    pageDelay: nonNegativeInt.optional(),
    downloadDelay: nonNegativeInt.optional(),
    maxAttempts: z.number().int().positive().optional(),
    retryDelay: nonNegativeInt.optional(),
    pageTimeout: z.number().int().positive().optional(),
    fileTimeout: z.number().int().positive().optional(),
    hostInterval: nonNegativeInt.optional(),
    headers: z.record(z.string()).optional(),
  })
  .passthrough()
  .superRefine((config, ctx) => {
    if (config.credentials && !config.loginUrl) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['loginUrl'],
        message: 'is required when credentials are given',
      });
    }
  });

/**
 * Schema for a site profile file: the per-site knowledge needed to crawl
 * one dataset publisher.
 */
export const siteProfileSchema = z
  .object({
    name: z.string().optional(),
    url: httpUrl.optional(),
    seeds: z.array(httpUrl).optional(),
    loginUrl: httpUrl.optional(),
    formAdapter: adapterName.optional(),
    postLoginFragments: keywordList.optional(),
    pageKeywords: keywordList.optional(),
    downloadKeywords: keywordList.optional(),
    termsPagePatterns: keywordList.optional(),
    fileExtensions: extensionList.optional(),
    maxDepth: nonNegativeInt.optional(),
    outputStructure: z.enum(['mirror', 'flat']).optional(),
  })
  .strict();

export type SiteProfile = z.infer<typeof siteProfileSchema>;

/**
 * Format zod issues as a single readable line.
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `"${issue.path.join('.')}" ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Parse an already-decoded JSON value as a site profile.
 *
 * @throws ConfigError listing every problem found
 */
export function parseSiteProfile(value: unknown, source = 'profile'): SiteProfile {
  const parsed = siteProfileSchema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigError(`Invalid site profile ${source}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Validate the user config and merge it over CONFIG_DEFAULTS
 * (later wins: defaults, then user values).
 *
 * @param userConfig - The partial config provided by the user
 * @returns A validated, fully populated DatasetFetchConfig
 * @throws ConfigError if required fields are missing or invalid
 */
export function validateAndMergeConfig(
  userConfig: Partial<DatasetFetchConfig> & { url: string },
): DatasetFetchConfig {
  const parsed = userConfigSchema.safeParse(userConfig);
  if (!parsed.success) {
    throw new ConfigError(`datasetFetch: ${formatIssues(parsed.error)}`);
  }

  // A key set to undefined keeps its default
  const merged: DatasetFetchConfig = {
    ...CONFIG_DEFAULTS,
    ...withoutUndefined(userConfig),
    url: userConfig.url.trim(),
  };
  merged.fileExtensions = merged.fileExtensions.map((ext) => ext.toLowerCase());
  return merged;
}

function withoutUndefined<T extends object>(value: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key in value) {
    if (value[key] !== undefined) {
      result[key] = value[key];
    }
  }
  return result;
}
