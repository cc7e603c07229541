/**
 * Core types for craftpkg
 */

// Content types
export type PackageType = 'mod' | 'datapack' | 'shader' | 'resourcepack' | 'modpack';

/** Package types that are placed as single files in a resource directory */
export type InstallablePackageType = Exclude<PackageType, 'modpack'>;

export interface Project {
  id: string;
  title: string;
  packageType: PackageType;
  /** File name on disk, when the project is already materialized */
  fileName?: string;
}

export interface ProjectDetail {
  id: string;
  title: string;
  packageType: PackageType;
  gameVersions: string[];
  /** Supported loader names, lower-cased */
  loaders: string[];
  /** Declared (required) dependency project ids, in declaration order */
  dependencies: string[];
}

export type ReleaseDependencyType = 'required' | 'optional' | 'incompatible' | 'embedded';

export interface ReleaseDependency {
  projectId?: string;
  versionId?: string;
  dependencyType: ReleaseDependencyType;
}

export interface ReleaseFile {
  url: string;
  fileName: string;
  /** sha1, lower-case hex */
  hash: string;
  primary: boolean;
  size?: number;
}

export interface VersionRelease {
  id: string;
  projectId: string;
  name: string;
  versionNumber: string;
  loaders: string[];
  gameVersions: string[];
  files: ReleaseFile[];
  dependencies: ReleaseDependency[];
  publishedAt?: string;
}

// Installations
export type InstallationMode = { kind: 'local' } | { kind: 'remote' };

export interface Installation {
  name: string;
  gameVersion: string;
  loader: string;
  loaderVersion?: string;
  /** Root directory of the game profile; resource directories live below it */
  directory: string;
  mode: InstallationMode;
}

export interface InstalledEntry {
  /** sha1 of the file contents; empty for directory-style packs */
  hash: string;
  projectId?: string;
  fileName: string;
  disabled: boolean;
}

// Dependency download state
export type DependencyDownloadState = 'idle' | 'downloading' | 'success' | 'failed';

export type InstallPolicy = 'auto' | 'manual' | 'main-only';

// Configuration types
export interface CraftPkgConfig {
  registry: {
    baseUrl: string;
    userAgent: string;
  };
  downloads: {
    concurrency: number;
    retries: number;
  };
  dependencies: {
    policy: InstallPolicy;
  };
  scan: {
    pageSize: number;
  };
}

export interface CraftPkgDirectories {
  config: string;
  data: string;
  cache: string;
}

// Command types
export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Error types
export class CraftPkgError extends Error {
  public code: string;
  public details?: unknown;

  constructor(message: string, code: string, details?: unknown) {
    super(message);
    this.name = 'CraftPkgError';
    this.code = code;
    this.details = details;
  }

  /** Reduced message shown to users; full detail goes to the log */
  get userMessage(): string {
    return this.message;
  }
}

export enum ErrorCodes {
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  RESOURCE_NOT_FOUND = 'RESOURCE_NOT_FOUND',
  DOWNLOAD_FAILED = 'DOWNLOAD_FAILED',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR',
  UNSUPPORTED_OPERATION = 'UNSUPPORTED_OPERATION'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
