// Shared utilities for the Wellness Retention Engine.
//
// Deterministic numeric and formatting helpers used by the models, the
// content index and the HTTP layer.

import type { ServiceLogger } from "./types.js";

// ─── Formatting ─────────────────────────────────────────────────────────────────

/**
 * Rounds to a fixed number of decimal places, half away from zero.
 */
export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return (Math.sign(value) * Math.round(Math.abs(value) * factor)) / factor;
}

/**
 * Formats a date as `YYYY-MM-DD` in the server's local time zone.
 */
export function formatLocalDate(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${year}-${month}-${day}`;
}

/**
 * Removes surrounding whitespace and quote characters, as left behind by
 * some .env editors (`OPENAI_API_KEY='...'`).
 */
export function stripQuotes(value: string): string {
  return value.trim().replace(/^['"]+|['"]+$/g, "");
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ─── Logging ────────────────────────────────────────────────────────────────────

/**
 * Console logger that prefixes every line with its level and component.
 */
export function createConsoleLogger(component: string): ServiceLogger {
  return {
    info: (msg, ...args) => console.log(`[INFO] [${component}] ${msg}`, ...args),
    warn: (msg, ...args) => console.warn(`[WARN] [${component}] ${msg}`, ...args),
    error: (msg, ...args) => console.error(`[ERROR] [${component}] ${msg}`, ...args),
  };
}

// ─── Vector math ────────────────────────────────────────────────────────────────

function assertSameLength(a: readonly number[], b: readonly number[]): void {
  if (a.length !== b.length) {
    throw new Error(`Dimension mismatch: ${a.length} vs ${b.length}`);
  }
}

export function dot(a: readonly number[], b: readonly number[]): number {
  assertSameLength(a, b);
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += a[i] * b[i];
  }
  return sum;
}

/**
 * Squared Euclidean distance. This is the metric a flat L2 index reports.
 */
export function squaredL2Distance(a: readonly number[], b: readonly number[]): number {
  assertSameLength(a, b);
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const d = a[i] - b[i];
    sum += d * d;
  }
  return sum;
}

export function euclideanDistance(a: readonly number[], b: readonly number[]): number {
  return Math.sqrt(squaredL2Distance(a, b));
}

/**
 * Logistic function, evaluated so that large |z| neither overflows nor
 * loses precision.
 */
export function sigmoid(z: number): number {
  if (z >= 0) {
    return 1 / (1 + Math.exp(-z));
  }
  const e = Math.exp(z);
  return e / (1 + e);
}

// ─── Random ─────────────────────────────────────────────────────────────────────

/**
 * Deterministic PRNG (mulberry32). Returns a function yielding floats in [0, 1).
 */
export function createSeededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
