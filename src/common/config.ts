/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Settings are read from environment variables named after section and key:
  getConfiguration('xmlcompare').get('batchConcurrency', 8) reads
  XMLCOMPARE_BATCH_CONCURRENCY and falls back to 8 when unset or invalid.
*/

import { isLogLevel, type LogLevel } from './logger';

export type Environment = Record<string, string | undefined>;

export interface Configuration {
  get(key: string, defaultValue: number): number;
  get(key: string, defaultValue: string): string;
  get(key: string, defaultValue: boolean): boolean;
  getLogLevel(key: string, defaultValue: LogLevel): LogLevel;
}

export function envName(section: string, key: string): string {
  const snake = key.replace(/([a-z0-9])([A-Z])/g, '$1_$2');
  return `${section}_${snake}`.toUpperCase();
}

export function getConfiguration(section: string, env: Environment = process.env): Configuration {
  const raw = (key: string): string | undefined => {
    const value = env[envName(section, key)];
    return value === undefined || value.trim() === '' ? undefined : value.trim();
  };

  function get(key: string, defaultValue: number): number;
  function get(key: string, defaultValue: string): string;
  function get(key: string, defaultValue: boolean): boolean;
  function get(key: string, defaultValue: number | string | boolean): number | string | boolean {
    const value = raw(key);
    if (value === undefined) return defaultValue;
    if (typeof defaultValue === 'number') {
      const parsed = Number(value);
      return Number.isFinite(parsed) && parsed > 0 ? parsed : defaultValue;
    }
    if (typeof defaultValue === 'boolean') {
      if (/^(1|true|yes|on)$/i.test(value)) return true;
      if (/^(0|false|no|off)$/i.test(value)) return false;
      return defaultValue;
    }
    return value;
  }

  return {
    get,
    getLogLevel(key: string, defaultValue: LogLevel): LogLevel {
      const value = raw(key)?.toLowerCase();
      return value !== undefined && isLogLevel(value) ? value : defaultValue;
    },
  };
}

/** Tunables of the comparison runtime, resolved once per caller. */
export interface CompareSettings {
  batchConcurrency: number;
  fetchTimeoutMs: number;
  maxBodyBytes: number;
  sessionTtlMs: number;
  sessionSweepMs: number;
}

export const DEFAULT_SETTINGS: CompareSettings = {
  batchConcurrency: 8,
  fetchTimeoutMs: 15_000,
  maxBodyBytes: 50 * 1024 * 1024,
  sessionTtlMs: 3600_000,
  sessionSweepMs: 300_000,
};

/** Whole number of at least one, else `fallback`. */
export function positiveInteger(value: number, fallback: number): number {
  const whole = Math.floor(value);
  return Number.isFinite(whole) && whole >= 1 ? whole : fallback;
}

export function loadSettings(env: Environment = process.env): CompareSettings {
  const config = getConfiguration('xmlcompare', env);
  return {
    batchConcurrency: positiveInteger(
      config.get('batchConcurrency', DEFAULT_SETTINGS.batchConcurrency),
      DEFAULT_SETTINGS.batchConcurrency
    ),
    fetchTimeoutMs: config.get('fetchTimeoutMs', DEFAULT_SETTINGS.fetchTimeoutMs),
    maxBodyBytes: config.get('maxBodyBytes', DEFAULT_SETTINGS.maxBodyBytes),
    sessionTtlMs: config.get('sessionTtlMs', DEFAULT_SETTINGS.sessionTtlMs),
    sessionSweepMs: config.get('sessionSweepMs', DEFAULT_SETTINGS.sessionSweepMs),
  };
}
