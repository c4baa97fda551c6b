import { config as loadDotenv } from "dotenv";
import { expand } from "dotenv-expand";

export const clamp = (value: number, min: number, max: number): number => {
  if (!Number.isFinite(value)) {
    return min;
  }
  if (value < min) {
    return min;
  }
  if (value > max) {
    return max;
  }
  return value;
};

const TRUTHY = new Set(["1", "true", "yes", "on"]);
const FALSY = new Set(["0", "false", "no", "off"]);

export const parseOptionalBoolean = (value?: string | null): boolean | null => {
  if (typeof value !== "string") {
    return null;
  }
  const normalised = value.trim().toLowerCase();
  if (TRUTHY.has(normalised)) {
    return true;
  }
  if (FALSY.has(normalised)) {
    return false;
  }
  return null;
};

export const parseBooleanFlag = (
  value?: string | null,
  defaultValue = false,
): boolean => parseOptionalBoolean(value) ?? defaultValue;

type NumericOptions = {
  min: number;
  max: number;
  integer?: boolean;
};

export const parseNumericEnv = (
  value: string | null | undefined,
  options: NumericOptions,
): number | null => {
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return null;
  }
  const parsed = options.integer
    ? Number.parseInt(trimmed, 10)
    : Number.parseFloat(trimmed);
  if (!Number.isFinite(parsed)) {
    return null;
  }
  return clamp(parsed, options.min, options.max);
};

export const getEnvVar = (key: string): string | undefined => {
  if (typeof process !== "undefined" && process.env[key] !== undefined) {
    return process.env[key];
  }
  return undefined;
};

export type LoadEnvironmentOptions = {
  /** Path of the dotenv file. Defaults to `.env` in the working directory. */
  path?: string;
};

/**
 * Reads a dotenv file into `process.env`, expanding `${VAR}` references.
 * Variables that are already set keep their value. Returns the keys read from
 * the file, or an empty list when the file does not exist.
 */
export const loadEnvironment = (
  options: LoadEnvironmentOptions = {},
): string[] => {
  const result = loadDotenv({ path: options.path });
  if (result.error || !result.parsed) {
    return [];
  }
  expand(result);
  return Object.keys(result.parsed);
};
