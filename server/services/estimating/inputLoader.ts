/**
 * JSON file inputs for pricing runs, validated at the boundary.
 */
import { readFile } from 'node:fs/promises';
import type { z } from 'zod';
import { withDictionaryOverrides, DEFAULT_DICTIONARY } from '@shared/estimate/dictionary';
import {
  buildingMetricsSchema,
  dictionaryOverrideSchema,
  estimateLineItemListSchema,
  priceKbSchema,
  referenceItemListSchema,
  type EstimatingDictionary,
} from '@shared/estimate/schema';
import type { BuildingMetrics, EstimateLineItem, PriceKBEntry, ReferenceItem } from '@shared/estimate/types';
import { describeZodError, EstimateInputError } from './errors';

export async function readJsonFile(path: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new EstimateInputError(`Cannot read ${path}: ${reason}`, 'FILE_UNREADABLE', { path });
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new EstimateInputError(`${path} is not valid JSON: ${reason}`, 'INVALID_JSON', { path });
  }
}

export function parseInput<S extends z.ZodTypeAny>(schema: S, raw: unknown, path: string): z.output<S> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new EstimateInputError(describeZodError(parsed.error, `${path} failed validation`), 'SCHEMA_INVALID', {
      path,
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}

export async function loadEstimateItems(path: string): Promise<EstimateLineItem[]> {
  return parseInput(estimateLineItemListSchema, await readJsonFile(path), path);
}

export async function loadPriceKb(path: string): Promise<PriceKBEntry[]> {
  return parseInput(priceKbSchema, await readJsonFile(path), path);
}

export async function loadReferenceItems(path: string): Promise<ReferenceItem[]> {
  return parseInput(referenceItemListSchema, await readJsonFile(path), path);
}

export async function loadBuildingMetrics(path: string): Promise<BuildingMetrics> {
  return parseInput(buildingMetricsSchema, await readJsonFile(path), path);
}

/**
 * Default keyword tables, with the tables named in `path` replacing the
 * defaults when a path is given.
 */
export async function loadDictionary(path: string | null): Promise<EstimatingDictionary> {
  if (!path) return DEFAULT_DICTIONARY;
  const overrides = parseInput(dictionaryOverrideSchema, await readJsonFile(path), path);
  return withDictionaryOverrides(overrides);
}
