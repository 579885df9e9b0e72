import Joi from 'joi';
import { InteractionRecord, CatalogEntry, RecommendationResponse } from '../types/models';
import { rawRecordToModel, rawCatalogEntryToModel } from './transformers';

/**
 * Validation schemas and functions for dataset records and API queries
 */

// Wire shapes as produced by the loader and the genre classifier
export interface RawInteractionRecord {
  user_id: string;
  item_name: string;
  playtime: number;
  recommend?: boolean | null;
  review?: string | null;
}

export interface RawCatalogEntry {
  item_name: string;
  categories: string[] | string;
}

export interface RecommendationQuery {
  game: string;
  topK: number;
  boost: number;
}

export interface GamesQuery {
  q?: string;
  limit: number;
}

export interface HistoryQuery {
  limit: number;
}

export const MAX_TOP_K = 100;

const validationOptions: Joi.ValidationOptions = {
  abortEarly: false,
  stripUnknown: true
};

// Validation schemas
export const interactionRecordSchema = Joi.object<RawInteractionRecord>({
  user_id: Joi.string().required(),
  item_name: Joi.string().required(),
  playtime: Joi.number().integer().min(0).default(0),
  recommend: Joi.boolean().allow(null).optional(),
  review: Joi.string().allow('', null).optional()
}).rename('playtime_forever', 'playtime', { ignoreUndefined: true, override: true });

export const catalogEntrySchema = Joi.object<RawCatalogEntry>({
  item_name: Joi.string().required(),
  categories: Joi.alternatives()
    .try(Joi.array().items(Joi.string().allow('')), Joi.string().allow(''))
    .default([])
}).rename('genre', 'categories', { ignoreUndefined: true, override: true });

export function createRecommendationQuerySchema(defaults: { topK: number; boostFactor: number }) {
  return Joi.object<RecommendationQuery>({
    game: Joi.string().min(1).required(),
    topK: Joi.number().integer().min(0).max(MAX_TOP_K).default(defaults.topK),
    boost: Joi.number().positive().default(defaults.boostFactor)
  });
}

export const gamesQuerySchema = Joi.object<GamesQuery>({
  q: Joi.string().trim().allow('').optional(),
  limit: Joi.number().integer().min(1).max(500).default(50)
});

export const historyQuerySchema = Joi.object<HistoryQuery>({
  limit: Joi.number().integer().min(1).max(100).default(10)
});

export const recommendationResponseSchema = Joi.object<RecommendationResponse>({
  likedItem: Joi.string().required(),
  rankedItems: Joi.array().items(Joi.string()).required(),
  scores: Joi.object().pattern(Joi.string(), Joi.number()).required(),
  categories: Joi.object().pattern(Joi.string(), Joi.array().items(Joi.string())).required(),
  support: Joi.object().pattern(Joi.string(), Joi.number().integer().min(0)).required(),
  cached: Joi.boolean().required()
});

// Validation functions
export function validateInteractionRecord(raw: unknown): { error?: Joi.ValidationError; value?: InteractionRecord } {
  const result = interactionRecordSchema.validate(raw, validationOptions);
  if (result.error) {
    return { error: result.error };
  }
  return { value: rawRecordToModel(result.value) };
}

export function validateCatalogEntry(raw: unknown): { error?: Joi.ValidationError; value?: CatalogEntry } {
  const result = catalogEntrySchema.validate(raw, validationOptions);
  if (result.error) {
    return { error: result.error };
  }
  return { value: rawCatalogEntryToModel(result.value) };
}

export function validateRecommendationResponse(raw: unknown): { error?: Joi.ValidationError; value?: RecommendationResponse } {
  const result = recommendationResponseSchema.validate(raw, { abortEarly: false });
  if (result.error) {
    return { error: result.error };
  }
  return { value: result.value };
}

export function validateQuery<T>(schema: Joi.ObjectSchema<T>, query: unknown): T {
  const result = schema.validate(query, validationOptions);
  if (result.error) {
    throwValidationError(result);
  }
  return result.value;
}

// Custom validation error class
export class ValidationError extends Error {
  public details: Joi.ValidationErrorItem[];

  constructor(message: string, details: Joi.ValidationErrorItem[]) {
    super(message);
    this.name = 'ValidationError';
    this.details = details;
  }
}

// Helper function to throw validation errors
export function throwValidationError(result: { error?: Joi.ValidationError }): never {
  if (result.error) {
    throw new ValidationError(result.error.message, result.error.details);
  }
  throw new Error('Validation failed');
}
