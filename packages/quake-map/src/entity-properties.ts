/**
 * Typed reads of entity key/value pairs ("origin" "0 64 -16", "spawnflags" "3", ...).
 *
 * `tryGet*` returns `undefined` when the key is missing or its value does not
 * parse; `get*` falls back to the supplied default in both cases.
 */

import { Vector2, Vector3, Vector4 } from '@levelscan/core';
import type { QuakeEntity } from './types.js';

const INT_PATTERN = /^\s*[+-]?\d+\s*$/;
const FLOAT_PATTERN = /^\s*[+-]?(?:\d+\.?\d*|\.\d+)\s*$/;

const INT32_MIN = -0x80000000;
const INT32_MAX = 0x7fffffff;

function parseIntValue(text: string): number | undefined {
  if (!INT_PATTERN.test(text)) return undefined;
  const value = Number(text.trim());
  if (value < INT32_MIN || value > INT32_MAX) return undefined;
  return value;
}

function parseFloatValue(text: string): number | undefined {
  if (!FLOAT_PATTERN.test(text)) return undefined;
  return Number(text.trim());
}

function parseBoolValue(text: string): boolean | undefined {
  const normalized = text.trim().toLowerCase();
  if (normalized === 'true') return true;
  if (normalized === 'false') return false;
  return undefined;
}

function parseComponents(text: string, count: number): number[] | undefined {
  const parts = text.split(' ').filter((part) => part.length > 0);
  if (parts.length !== count) return undefined;

  const values: number[] = [];
  for (const part of parts) {
    const value = parseFloatValue(part);
    if (value === undefined) return undefined;
    values.push(value);
  }
  return values;
}

export function tryGetEntityString(entity: QuakeEntity, key: string): string | undefined {
  return entity.keyValues.get(key);
}

export function tryGetEntityBool(entity: QuakeEntity, key: string): boolean | undefined {
  const text = entity.keyValues.get(key);
  return text === undefined ? undefined : parseBoolValue(text);
}

/** 32-bit signed integers; surrounding whitespace and a leading sign are allowed. */
export function tryGetEntityInt(entity: QuakeEntity, key: string): number | undefined {
  const text = entity.keyValues.get(key);
  return text === undefined ? undefined : parseIntValue(text);
}

/** Plain decimals only; no exponent. */
export function tryGetEntityFloat(entity: QuakeEntity, key: string): number | undefined {
  const text = entity.keyValues.get(key);
  return text === undefined ? undefined : parseFloatValue(text);
}

export function tryGetEntityVector2(entity: QuakeEntity, key: string): Vector2 | undefined {
  const text = entity.keyValues.get(key);
  const c = text === undefined ? undefined : parseComponents(text, 2);
  if (!c) return undefined;
  return new Vector2(c[0], c[1]);
}

export function tryGetEntityVector3(entity: QuakeEntity, key: string): Vector3 | undefined {
  const text = entity.keyValues.get(key);
  const c = text === undefined ? undefined : parseComponents(text, 3);
  if (!c) return undefined;
  return new Vector3(c[0], c[1], c[2]);
}

export function tryGetEntityVector4(entity: QuakeEntity, key: string): Vector4 | undefined {
  const text = entity.keyValues.get(key);
  const c = text === undefined ? undefined : parseComponents(text, 4);
  if (!c) return undefined;
  return new Vector4(c[0], c[1], c[2], c[3]);
}

export function getEntityString(entity: QuakeEntity, key: string, defaultValue: string): string {
  return tryGetEntityString(entity, key) ?? defaultValue;
}

export function getEntityBool(entity: QuakeEntity, key: string, defaultValue = false): boolean {
  return tryGetEntityBool(entity, key) ?? defaultValue;
}

export function getEntityInt(entity: QuakeEntity, key: string, defaultValue = 0): number {
  return tryGetEntityInt(entity, key) ?? defaultValue;
}

export function getEntityFloat(entity: QuakeEntity, key: string, defaultValue = Number.NaN): number {
  return tryGetEntityFloat(entity, key) ?? defaultValue;
}

export function getEntityVector2(entity: QuakeEntity, key: string, defaultValue: Vector2): Vector2 {
  return tryGetEntityVector2(entity, key) ?? defaultValue;
}

export function getEntityVector3(entity: QuakeEntity, key: string, defaultValue: Vector3): Vector3 {
  return tryGetEntityVector3(entity, key) ?? defaultValue;
}

export function getEntityVector4(entity: QuakeEntity, key: string, defaultValue: Vector4): Vector4 {
  return tryGetEntityVector4(entity, key) ?? defaultValue;
}
