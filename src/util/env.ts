/**
 * Environment utilities for runtime/stage detection and safe env var access.
 */

export function getNodeEnv(): string {
  return process.env.NODE_ENV || "development";
}

export function getStage(): string {
  // Prefer explicit STAGE; derive from NODE_ENV otherwise
  const stage = process.env.STAGE;
  if (stage && stage.length > 0) return stage;
  return getNodeEnv() === "production" ? "prod" : "dev";
}

export function isProduction(): boolean {
  const stage = getStage();
  return stage === "prod" || getNodeEnv() === "production";
}

export function isTest(): boolean {
  return getNodeEnv() === "test";
}

export function isLocal(): boolean {
  // Absence of a Lambda execution env implies local
  const isLambda = Boolean(
    process.env.AWS_LAMBDA_FUNCTION_NAME || process.env.AWS_EXECUTION_ENV
  );
  return process.env.IS_LOCAL === "true" || !isLambda;
}

export interface GetEnvVarOptions<T> {
  parse: (raw: string) => T;
  defaultValue?: T;
  required?: boolean;
  stageAware?: boolean; // if true, prefer NAME__<stage> before NAME
}

/**
 * Reads an environment variable with fallbacks and parsing.
 * - If `stageAware` is true (default), checks NAME__<stage> first, then NAME.
 * - If not found, returns `defaultValue` when provided; otherwise throws when `required` is true.
 */
export function getEnvVar<T>(
  name: string,
  options: GetEnvVarOptions<T> & { defaultValue: T }
): T;
export function getEnvVar<T>(
  name: string,
  options: GetEnvVarOptions<T>
): T | undefined;
export function getEnvVar<T>(
  name: string,
  options: GetEnvVarOptions<T>
): T | undefined {
  const stageKey = `${name}__${getStage()}`;
  const stageAware = options.stageAware !== false;

  const candidate = stageAware
    ? process.env[stageKey] ?? process.env[name]
    : process.env[name];

  if (candidate != null && candidate !== "") {
    return options.parse(candidate);
  }

  if (options.defaultValue !== undefined) {
    return options.defaultValue;
  }

  if (options.required) {
    const tried = stageAware ? `${stageKey} or ${name}` : name;
    throw new Error(`Missing required env var: ${tried}`);
  }

  return undefined;
}

export function getString(name: string, defaultValue: string): string;
export function getString(name: string): string | undefined;
export function getString(
  name: string,
  defaultValue?: string
): string | undefined {
  return getEnvVar(name, { defaultValue, parse: (raw) => raw });
}

export function getNumber(name: string, defaultValue: number): number;
export function getNumber(name: string): number | undefined;
export function getNumber(
  name: string,
  defaultValue?: number
): number | undefined {
  return getEnvVar(name, {
    defaultValue,
    parse: (raw) => {
      const n = Number(raw);
      if (Number.isNaN(n))
        throw new Error(`Env var ${name} is not a number: ${raw}`);
      return n;
    },
  });
}

/**
 * Comma-separated list; blank entries are dropped.
 */
export function getList(name: string, defaultValue: string[]): string[] {
  return getEnvVar(name, {
    defaultValue,
    parse: (raw) =>
      raw
        .split(",")
        .map((s) => s.trim())
        .filter((s) => s.length > 0),
  });
}
