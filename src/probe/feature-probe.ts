import { createNodeHostRuntime, type HostRuntime } from "./host.js";
import { classifyOsName, type OsClassification } from "./os.js";
import { resolveExecutablePath } from "./path-search.js";
import { satisfiesMinimumVersion } from "./version.js";

const PATH_VARIABLE = "PATH";
const IMAGE_CONVERT_EXECUTABLE = "convert";
const IMAGE_IDENTIFY_EXECUTABLE = "identify";

const HARD_LINK_CALLABLE = "fs.link";
const SYMLINK_CALLABLE = "fs.symlink";
const USER_ID_CALLABLE = "process.getuid";

export interface ResolvedExecutable {
  path: string | undefined;
}

/**
 * Memoized probe answers. A populated slot is never recomputed, including a
 * resolved-but-missing executable (`{ path: undefined }`).
 */
export interface ProbeCache {
  imageConvert?: ResolvedExecutable;
  imageIdentify?: ResolvedExecutable;
  os?: OsClassification;
}

export interface FeatureProbeOptions {
  host?: HostRuntime;
  cache?: ProbeCache;
}

export interface FeatureSnapshot {
  os: OsClassification;
  hardLink: boolean;
  symLink: boolean;
  userId: boolean;
  imageConvert: string | undefined;
  imageIdentify: string | undefined;
}

export function createProbeCache(): ProbeCache {
  return {};
}

export class FeatureProbe {
  private readonly host: HostRuntime;
  private readonly cache: ProbeCache;

  constructor(options: FeatureProbeOptions = {}) {
    this.host = options.host ?? createNodeHostRuntime();
    this.cache = options.cache ?? createProbeCache();
  }

  public supportsHardLink(): boolean {
    return this.host.resolveCallable(HARD_LINK_CALLABLE);
  }

  public supportsSymLink(): boolean {
    return this.host.resolveCallable(SYMLINK_CALLABLE);
  }

  public supportsUserId(): boolean {
    return this.host.resolveCallable(USER_ID_CALLABLE);
  }

  /**
   * True when the runtime component `name` is loaded and, if `minVersion` is
   * given, its version is at least `minVersion`.
   */
  public hasExtensionSupport(name: string, minVersion?: string): boolean {
    const version = this.host.componentVersion(name);
    if (version === undefined) {
      return false;
    }
    if (minVersion === undefined) {
      return true;
    }
    return satisfiesMinimumVersion(version, minVersion);
  }

  public extensionVersion(name: string): string | undefined {
    return this.host.componentVersion(name);
  }

  public hasFunction(name: string): boolean {
    return this.host.resolveCallable(name);
  }

  public hasImageConvert(): boolean {
    return isExecutablePresent(this.getImageConvertExecutable());
  }

  public getImageConvertExecutable(): string | undefined {
    if (!this.cache.imageConvert) {
      this.cache.imageConvert = {
        path: this.findExecutable(IMAGE_CONVERT_EXECUTABLE),
      };
    }
    return this.cache.imageConvert.path;
  }

  public hasImageIdentify(): boolean {
    return isExecutablePresent(this.getImageIdentifyExecutable());
  }

  public getImageIdentifyExecutable(): string | undefined {
    if (!this.cache.imageIdentify) {
      this.cache.imageIdentify = {
        path: this.findExecutable(IMAGE_IDENTIFY_EXECUTABLE),
      };
    }
    return this.cache.imageIdentify.path;
  }

  public osClassification(): OsClassification {
    if (!this.cache.os) {
      this.cache.os = classifyOsName(this.host.osName());
    }
    return this.cache.os;
  }

  public searchPath(): string | undefined {
    return this.host.env(PATH_VARIABLE);
  }

  /** Uncached PATH search for an arbitrary executable. */
  public findExecutable(fileName: string): string | undefined {
    return resolveExecutablePath(fileName, {
      os: this.osClassification(),
      pathValue: this.searchPath(),
      fileExists: (candidate) => this.host.fileExists(candidate),
    });
  }

  public snapshot(): FeatureSnapshot {
    return {
      os: this.osClassification(),
      hardLink: this.supportsHardLink(),
      symLink: this.supportsSymLink(),
      userId: this.supportsUserId(),
      imageConvert: this.getImageConvertExecutable(),
      imageIdentify: this.getImageIdentifyExecutable(),
    };
  }
}

let defaultProbe: FeatureProbe | undefined;

export function getDefaultFeatureProbe(): FeatureProbe {
  if (!defaultProbe) {
    defaultProbe = new FeatureProbe();
  }
  return defaultProbe;
}

/** A resolved executable counts only when its path is a non-empty string. */
export function isExecutablePresent(
  value: string | undefined,
): value is string {
  return typeof value === "string" && value.length > 0;
}
