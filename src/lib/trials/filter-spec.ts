/**
 * FilterSpec: the validated, normalized description of a trial search.
 *
 * Parsing never touches storage. Anything out of range is rejected with a
 * ValidationError whose message names the offending parameter.
 */

import { z } from 'zod';
import { ValidationError } from '@/lib/errors';
import { limitSchema, pageSchema } from '@/lib/pagination-schema';

export const SORT_OPTIONS = ['relevance', 'newest', 'enrollment'] as const;
export type SortOption = (typeof SORT_OPTIONS)[number];

export const MAX_KEYWORD_LENGTH = 200;
export const MAX_FILTER_VALUES = 20;
export const MAX_FILTER_VALUE_LENGTH = 255;

export interface FilterSpec {
  keyword?: string;
  diseaseAreas: string[];
  phases: string[];
  statuses: string[];
  location?: string;
  sponsor?: string;
  page: number;
  limit: number;
  sortBy: SortOption;
}

function optionalText(name: string, maxLength: number) {
  return z
    .string()
    .trim()
    .max(maxLength, `${name} must be at most ${maxLength} characters`)
    .optional()
    .transform((value) => (value ? value : undefined));
}

function valueList(name: string) {
  return z
    .array(
      z
        .string()
        .trim()
        .max(MAX_FILTER_VALUE_LENGTH, `${name} values must be at most ${MAX_FILTER_VALUE_LENGTH} characters`)
    )
    .default([])
    .transform((values) => Array.from(new Set(values.filter((value) => value.length > 0))))
    .refine((values) => values.length <= MAX_FILTER_VALUES, {
      message: `${name} accepts at most ${MAX_FILTER_VALUES} values`,
    });
}

// Blank numeric params behave like absent ones
const blankAsAbsent = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

export const filterSpecSchema = z.object({
  keyword: optionalText('keyword', MAX_KEYWORD_LENGTH),
  disease_areas: valueList('disease_areas'),
  phases: valueList('phases'),
  statuses: valueList('statuses'),
  location: optionalText('location', MAX_FILTER_VALUE_LENGTH),
  sponsor: optionalText('sponsor', MAX_FILTER_VALUE_LENGTH),
  page: z.preprocess(blankAsAbsent, pageSchema),
  limit: z.preprocess(blankAsAbsent, limitSchema),
  sort_by: z.preprocess(
    blankAsAbsent,
    z
      .enum(SORT_OPTIONS, {
        errorMap: () => ({ message: `sort_by must be one of: ${SORT_OPTIONS.join(', ')}` }),
      })
      .default('relevance')
  ),
});

export type FilterSpecInput = z.input<typeof filterSpecSchema>;

/**
 * Validate raw search input (snake_case, as it arrives on the wire)
 */
export function parseFilterSpec(input: FilterSpecInput): FilterSpec {
  const result = filterSpecSchema.safeParse(input);

  if (!result.success) {
    const firstIssue = result.error.issues[0];
    throw new ValidationError(firstIssue?.message ?? 'Invalid search parameters');
  }

  const data = result.data;
  return {
    keyword: data.keyword,
    diseaseAreas: data.disease_areas,
    phases: data.phases,
    statuses: data.statuses,
    location: data.location,
    sponsor: data.sponsor,
    page: data.page,
    limit: data.limit,
    sortBy: data.sort_by,
  };
}

// Both `phases=a&phases=b` and `phases[]=a` are accepted
function readList(searchParams: URLSearchParams, key: string): string[] {
  return [...searchParams.getAll(key), ...searchParams.getAll(`${key}[]`)];
}

function readOne(searchParams: URLSearchParams, key: string): string | undefined {
  return searchParams.get(key) ?? undefined;
}

export function filterSpecFromSearchParams(searchParams: URLSearchParams): FilterSpec {
  return parseFilterSpec({
    keyword: readOne(searchParams, 'keyword'),
    disease_areas: readList(searchParams, 'disease_areas'),
    phases: readList(searchParams, 'phases'),
    statuses: readList(searchParams, 'statuses'),
    location: readOne(searchParams, 'location'),
    sponsor: readOne(searchParams, 'sponsor'),
    page: readOne(searchParams, 'page'),
    limit: readOne(searchParams, 'limit'),
    sort_by: readOne(searchParams, 'sort_by'),
  });
}
