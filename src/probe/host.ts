import * as childProcess from "node:child_process";
import * as crypto from "node:crypto";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import process from "node:process";
import * as util from "node:util";
import * as zlib from "node:zlib";

/**
 * Read-only view of the host the probe runs on. Everything the probe learns
 * about the environment goes through this interface.
 */
export interface HostRuntime {
  osName(): string;
  env(name: string): string | undefined;
  fileExists(path: string): boolean;
  componentVersion(name: string): string | undefined;
  resolveCallable(name: string): boolean;
}

export interface NodeHostRuntimeOptions {
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
}

const BUILTIN_NAMESPACES: Readonly<Record<string, unknown>> = {
  child_process: childProcess,
  crypto,
  fs,
  os,
  path,
  process,
  util,
  zlib,
};

export function createNodeHostRuntime(
  options: NodeHostRuntimeOptions = {},
): HostRuntime {
  const environment = options.env ?? process.env;
  const platform = options.platform ?? process.platform;

  return {
    osName: () => os.type(),
    env: (name) => lookupEnvironment(environment, name, platform),
    fileExists: (candidate) => isExistingFile(candidate),
    componentVersion: (name) => {
      const version: unknown = Reflect.get(process.versions, name);
      return typeof version === "string" ? version : undefined;
    },
    resolveCallable: (name) => isCallable(resolveDottedName(name)),
  };
}

export function lookupEnvironment(
  environment: NodeJS.ProcessEnv,
  name: string,
  platform: NodeJS.Platform,
): string | undefined {
  const direct = environment[name];
  if (direct !== undefined || platform !== "win32") {
    return direct;
  }

  const wanted = name.toUpperCase();
  for (const [key, value] of Object.entries(environment)) {
    if (key.toUpperCase() === wanted) {
      return value;
    }
  }
  return undefined;
}

export function resolveDottedName(name: string): unknown {
  const segments = name.split(".").filter((segment) => segment.length > 0);
  if (segments.length === 0) {
    return undefined;
  }

  const [head, ...rest] = segments;
  let current: unknown = hasOwn(BUILTIN_NAMESPACES, head)
    ? BUILTIN_NAMESPACES[head]
    : readOwn(globalThis, head);

  for (const segment of rest) {
    if (!isIndexable(current)) {
      return undefined;
    }
    current = readOwn(current, segment);
  }
  return current;
}

// Inherited members (`toString`, `constructor`) are not runtime primitives.
function readOwn(target: object, key: string): unknown {
  return hasOwn(target, key) ? Reflect.get(target, key) : undefined;
}

function hasOwn(target: object, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(target, key);
}

function isIndexable(value: unknown): value is object {
  return (
    (typeof value === "object" && value !== null) || typeof value === "function"
  );
}

function isCallable(value: unknown): boolean {
  return typeof value === "function";
}

function isExistingFile(candidate: string): boolean {
  try {
    return fs.statSync(candidate).isFile();
  } catch {
    return false;
  }
}
