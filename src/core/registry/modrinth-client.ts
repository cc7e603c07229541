/**
 * Modrinth-backed ContentRegistryClient (API v2).
 *
 * Endpoints:
 *   GET /project/{id}                                  project detail
 *   GET /project/{id}/version                          all releases (declared dependencies)
 *   GET /project/{id}/version?game_versions=[..]&loaders=[..]
 *   GET /version_file/{sha1}?algorithm=sha1            release owning a file
 */

import fetch, { type RequestInit, type Response } from 'node-fetch';
import type {
  PackageType,
  ProjectDetail,
  ReleaseDependency,
  ReleaseDependencyType,
  ReleaseFile,
  VersionRelease
} from '../../types/index.js';
import type { ContentRegistryClient } from './registry-client.js';
import { releaseLoaderFilter } from '../compatibility/compatibility-filter.js';
import { DownloadError, isAbortError } from '../../utils/errors.js';
import { normalizeHash } from '../../utils/hash.js';
import { logger } from '../../utils/logger.js';
import { DEFAULTS, LOADERS } from '../../constants/index.js';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface ModrinthClientOptions {
  baseUrl?: string;
  userAgent?: string;
  fetchImpl?: FetchLike;
}

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function str(record: JsonRecord, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' ? value : undefined;
}

function strList(record: JsonRecord, key: string): string[] {
  const value = record[key];
  if (!Array.isArray(value)) return [];
  return value.filter((item): item is string => typeof item === 'string');
}

const DEPENDENCY_TYPES: readonly ReleaseDependencyType[] = ['required', 'optional', 'incompatible', 'embedded'];

function toDependencyType(value: string | undefined): ReleaseDependencyType {
  return DEPENDENCY_TYPES.find(type => type === value) ?? 'optional';
}

/**
 * Map a Modrinth project type onto a package type. Datapacks are published as
 * `mod` projects whose only loader is `datapack`.
 */
export function toPackageType(projectType: string | undefined, loaders: string[]): PackageType {
  switch (projectType) {
    case 'shader':
      return 'shader';
    case 'resourcepack':
      return 'resourcepack';
    case 'modpack':
      return 'modpack';
    case 'datapack':
      return 'datapack';
    default:
      if (loaders.length > 0 && loaders.every(loader => loader === LOADERS.DATAPACK)) {
        return 'datapack';
      }
      return 'mod';
  }
}

function parseFile(raw: unknown): ReleaseFile | null {
  if (!isRecord(raw)) return null;
  const url = str(raw, 'url');
  const fileName = str(raw, 'filename');
  const hashes = raw.hashes;
  const sha1 = isRecord(hashes) ? str(hashes, 'sha1') : undefined;
  if (!url || !fileName || !sha1) {
    return null;
  }
  const size = raw.size;
  return {
    url,
    fileName,
    hash: normalizeHash(sha1),
    primary: raw.primary === true,
    ...(typeof size === 'number' ? { size } : {})
  };
}

function parseDependency(raw: unknown): ReleaseDependency | null {
  if (!isRecord(raw)) return null;
  const projectId = str(raw, 'project_id');
  const versionId = str(raw, 'version_id');
  return {
    ...(projectId ? { projectId } : {}),
    ...(versionId ? { versionId } : {}),
    dependencyType: toDependencyType(str(raw, 'dependency_type'))
  };
}

export function parseRelease(raw: unknown): VersionRelease | null {
  if (!isRecord(raw)) return null;
  const id = str(raw, 'id');
  const projectId = str(raw, 'project_id');
  if (!id || !projectId) return null;

  const files = Array.isArray(raw.files)
    ? raw.files.map(parseFile).filter((file): file is ReleaseFile => file !== null)
    : [];
  const dependencies = Array.isArray(raw.dependencies)
    ? raw.dependencies.map(parseDependency).filter((dep): dep is ReleaseDependency => dep !== null)
    : [];
  const publishedAt = str(raw, 'date_published');

  return {
    id,
    projectId,
    name: str(raw, 'name') ?? id,
    versionNumber: str(raw, 'version_number') ?? id,
    loaders: strList(raw, 'loaders').map(loader => loader.toLowerCase()),
    gameVersions: strList(raw, 'game_versions'),
    files,
    dependencies,
    ...(publishedAt ? { publishedAt } : {})
  };
}

function parseReleaseList(raw: unknown): VersionRelease[] {
  if (!Array.isArray(raw)) return [];
  return raw
    .map(parseRelease)
    .filter((release): release is VersionRelease => release !== null);
}

/** Newest first; releases without a publish date keep their relative order at the end */
export function sortNewestFirst(releases: VersionRelease[]): VersionRelease[] {
  return [...releases].sort((a, b) => (b.publishedAt ?? '').localeCompare(a.publishedAt ?? ''));
}

/**
 * Required dependency project ids of a release, de-duplicated in declaration order
 */
export function requiredDependencyIds(release: VersionRelease | undefined): string[] {
  if (!release) return [];
  const ids: string[] = [];
  for (const dependency of release.dependencies) {
    if (dependency.dependencyType !== 'required' || !dependency.projectId) continue;
    if (!ids.includes(dependency.projectId)) {
      ids.push(dependency.projectId);
    }
  }
  return ids;
}

export class ModrinthRegistryClient implements ContentRegistryClient {
  private readonly baseUrl: string;
  private readonly userAgent: string;
  private readonly fetchImpl: FetchLike;

  constructor(options: ModrinthClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULTS.REGISTRY_BASE_URL).replace(/\/+$/, '');
    this.userAgent = options.userAgent ?? DEFAULTS.USER_AGENT;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async fetchProjectDetail(projectId: string, signal?: AbortSignal): Promise<ProjectDetail | null> {
    const raw = await this.getJson(`/project/${encodeURIComponent(projectId)}`, signal);
    if (raw === null || !isRecord(raw)) {
      return null;
    }

    const id = str(raw, 'id') ?? projectId;
    const loaders = strList(raw, 'loaders').map(loader => loader.toLowerCase());

    const allReleases = parseReleaseList(
      await this.getJson(`/project/${encodeURIComponent(projectId)}/version`, signal)
    );
    const newest = sortNewestFirst(allReleases)[0];

    return {
      id,
      title: str(raw, 'title') ?? id,
      packageType: toPackageType(str(raw, 'project_type'), loaders),
      gameVersions: strList(raw, 'game_versions'),
      loaders,
      dependencies: requiredDependencyIds(newest).filter(depId => depId !== id)
    };
  }

  async fetchCompatibleReleases(
    projectId: string,
    gameVersion: string,
    loader: string,
    packageType: PackageType,
    signal?: AbortSignal
  ): Promise<VersionRelease[]> {
    const loaderTags = releaseLoaderFilter(packageType, loader);
    const params = new URLSearchParams();
    params.set('game_versions', JSON.stringify([gameVersion]));
    if (loaderTags.length > 0) {
      params.set('loaders', JSON.stringify(loaderTags));
    }

    const raw = await this.getJson(
      `/project/${encodeURIComponent(projectId)}/version?${params.toString()}`,
      signal
    );
    if (raw === null) {
      logger.debug(`No releases listed for ${projectId}`);
      return [];
    }

    // The server filter is re-applied locally with the same rule
    const releases = parseReleaseList(raw).filter(release =>
      release.gameVersions.includes(gameVersion) &&
      (loaderTags.length === 0 || release.loaders.some(tag => loaderTags.includes(tag)))
    );
    return sortNewestFirst(releases);
  }

  async fetchReleaseByHash(hash: string, signal?: AbortSignal): Promise<VersionRelease | null> {
    const raw = await this.getJson(
      `/version_file/${encodeURIComponent(normalizeHash(hash))}?algorithm=sha1`,
      signal
    );
    return raw === null ? null : parseRelease(raw);
  }

  /**
   * GET a JSON document. 404 yields null; other failures raise DownloadError.
   */
  private async getJson(pathAndQuery: string, signal?: AbortSignal): Promise<unknown> {
    const url = `${this.baseUrl}${pathAndQuery}`;
    let res: Response;
    try {
      res = await this.fetchImpl(url, {
        headers: { 'User-Agent': this.userAgent, Accept: 'application/json' },
        ...(signal ? { signal } : {})
      });
    } catch (error) {
      if (isAbortError(error)) throw error;
      logger.error(`Registry request failed: ${url}`, { error });
      throw new DownloadError(`registry request failed (${url})`, { url, error });
    }

    if (res.status === 404) {
      logger.debug(`Registry returned 404 for ${url}`);
      return null;
    }
    if (!res.ok) {
      logger.error(`Registry request failed: ${url}`, { status: res.status, statusText: res.statusText });
      throw new DownloadError(`registry responded ${res.status} (${url})`, { url, status: res.status });
    }

    try {
      const body: unknown = await res.json();
      return body;
    } catch (error) {
      throw new DownloadError(`registry returned invalid JSON (${url})`, { url, error });
    }
  }
}

