import type { MovieListParams } from '../types';
import { DEFAULT_SORT } from '@/lib/movie-search';

export const MAX_SORT_LENGTH = 64;
export const MAX_KEYWORDS = 20;
export const MAX_KEYWORD_LENGTH = 200;

export interface ValidationError {
  field: string;
  message: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  parsed: MovieListParams | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function validateListParams(params: { keywords?: unknown; sort?: unknown }): ValidationResult {
  const errors: ValidationError[] = [];

  // Optional: sort (default duration)
  let sort = DEFAULT_SORT;
  if (params.sort !== undefined && params.sort !== null) {
    if (typeof params.sort !== 'string') {
      errors.push({ field: 'sort', message: 'Sort must be a string' });
    } else if (params.sort.length > MAX_SORT_LENGTH) {
      errors.push({ field: 'sort', message: `Sort must not exceed ${MAX_SORT_LENGTH} characters` });
    } else if (params.sort.trim()) {
      sort = params.sort.trim();
    }
  }

  // Optional: keywords
  const keywords: string[] = [];
  if (params.keywords !== undefined && params.keywords !== null) {
    if (!Array.isArray(params.keywords)) {
      errors.push({ field: 'keywords', message: 'Keywords must be an array of strings' });
    } else if (params.keywords.length > MAX_KEYWORDS) {
      errors.push({ field: 'keywords', message: `At most ${MAX_KEYWORDS} keywords are allowed` });
    } else {
      params.keywords.forEach((keyword: unknown, index) => {
        if (typeof keyword !== 'string') {
          errors.push({ field: `keywords[${index}]`, message: 'Keyword must be a string' });
        } else if (keyword.length > MAX_KEYWORD_LENGTH) {
          errors.push({
            field: `keywords[${index}]`,
            message: `Keyword must not exceed ${MAX_KEYWORD_LENGTH} characters`,
          });
        } else {
          keywords.push(keyword);
        }
      });
    }
  }

  if (errors.length > 0) {
    return { valid: false, errors, parsed: null };
  }

  return { valid: true, errors: [], parsed: { keywords, sort } };
}

export function validateSearchBody(body: unknown): ValidationResult {
  if (!isRecord(body)) {
    return {
      valid: false,
      errors: [{ field: 'body', message: 'Request body must be a JSON object' }],
      parsed: null,
    };
  }
  return validateListParams({ keywords: body.keywords, sort: body.sort });
}
