/**
 * Installed Content Index
 *
 * In-memory view of one resource directory: hash -> entry, file name -> entry
 * and the set of project ids present. Built by a directory scan and kept
 * current by incremental updates after installs, toggles and deletions.
 *
 * A scan builds a fresh state and swaps it in once the walk completes.
 * Mutations made while a scan is in flight are applied to the live state and
 * replayed onto the new one before the swap, so no lookup ever sees a
 * half-built index and no recorded install is lost to a concurrent rescan.
 */

import type { InstalledEntry, InstallablePackageType } from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import { isDisabledName, toDisabledName, toEnabledName } from '../resources/disable-toggle.js';

export type ScanFunction = (signal?: AbortSignal) => Promise<InstalledEntry[]>;

type Mutation = (state: IndexState) => void;

class IndexState {
  readonly byHash = new Map<string, InstalledEntry>();
  readonly byFile = new Map<string, InstalledEntry>();
  /** projectId -> number of entries carrying it */
  private readonly projectRefs = new Map<string, number>();
  /** Project ids recorded without a file */
  private readonly projectMarkers = new Set<string>();

  add(entry: InstalledEntry): void {
    const existingByFile = this.byFile.get(entry.fileName);
    if (existingByFile) this.drop(existingByFile);
    if (entry.hash) {
      const existingByHash = this.byHash.get(entry.hash);
      if (existingByHash) this.drop(existingByHash);
      this.byHash.set(entry.hash, entry);
    }
    this.byFile.set(entry.fileName, entry);
    if (entry.projectId) {
      this.projectRefs.set(entry.projectId, (this.projectRefs.get(entry.projectId) ?? 0) + 1);
    }
  }

  drop(entry: InstalledEntry): void {
    if (entry.hash && this.byHash.get(entry.hash) === entry) {
      this.byHash.delete(entry.hash);
    }
    if (this.byFile.get(entry.fileName) === entry) {
      this.byFile.delete(entry.fileName);
    }
    if (entry.projectId) {
      const refs = (this.projectRefs.get(entry.projectId) ?? 1) - 1;
      if (refs > 0) {
        this.projectRefs.set(entry.projectId, refs);
      } else {
        this.projectRefs.delete(entry.projectId);
        this.projectMarkers.delete(entry.projectId);
      }
    }
  }

  mark(projectId: string): void {
    this.projectMarkers.add(projectId);
  }

  hasProject(projectId: string): boolean {
    return this.projectRefs.has(projectId) || this.projectMarkers.has(projectId);
  }
}

export class InstalledContentIndex {
  private state = new IndexState();
  private scanned = false;
  private inflight: Promise<InstalledEntry[]> | null = null;
  private journal: Mutation[] | null = null;

  constructor(
    readonly directory: string,
    readonly packageType: InstallablePackageType,
    private readonly scanner: ScanFunction
  ) {}

  get isScanned(): boolean {
    return this.scanned;
  }

  /**
   * Rescan the directory and replace the index contents.
   * Concurrent callers share one in-flight scan.
   */
  refresh(signal?: AbortSignal): Promise<InstalledEntry[]> {
    if (!this.inflight) {
      this.inflight = this.runScan(signal).finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  /** Scan once; later calls reuse the cached result */
  async ensureScanned(signal?: AbortSignal): Promise<void> {
    if (!this.scanned) {
      await this.refresh(signal);
    }
  }

  contains(hash: string): boolean {
    return hash.length > 0 && this.state.byHash.has(hash.toLowerCase());
  }

  containsProject(projectId: string): boolean {
    return this.state.hasProject(projectId);
  }

  entries(): InstalledEntry[] {
    return [...this.state.byFile.values()];
  }

  findByHash(hash: string): InstalledEntry | undefined {
    return this.state.byHash.get(hash.toLowerCase());
  }

  /** Look up by file name in either enabled or disabled form */
  findByFileName(fileName: string): InstalledEntry | undefined {
    const enabled = toEnabledName(fileName);
    return this.state.byFile.get(enabled) ?? this.state.byFile.get(toDisabledName(enabled));
  }

  findByProject(projectId: string): InstalledEntry[] {
    return this.entries().filter(entry => entry.projectId === projectId);
  }

  insert(hash: string, projectId?: string, fileName?: string): void {
    const name = fileName ?? hash;
    const entry: InstalledEntry = {
      hash: hash.toLowerCase(),
      ...(projectId ? { projectId } : {}),
      fileName: name,
      disabled: isDisabledName(name)
    };
    this.apply(state => state.add(entry));
    logger.debug(`Index ${this.directory}: recorded ${entry.fileName}`, { hash: entry.hash, projectId });
  }

  insertProject(projectId: string): void {
    this.apply(state => state.mark(projectId));
  }

  remove(hash: string): void {
    const key = hash.toLowerCase();
    this.apply(state => {
      const entry = state.byHash.get(key);
      if (entry) state.drop(entry);
    });
  }

  removeFile(fileName: string): void {
    this.apply(state => {
      const entry = state.byFile.get(fileName);
      if (entry) state.drop(entry);
    });
  }

  /** Record a rename (toggle) of a file; the hash is unchanged */
  rename(fromName: string, toName: string): void {
    this.apply(state => {
      const entry = state.byFile.get(fromName);
      if (!entry) return;
      state.drop(entry);
      state.add({ ...entry, fileName: toName, disabled: isDisabledName(toName) });
    });
  }

  private apply(mutation: Mutation): void {
    mutation(this.state);
    this.journal?.push(mutation);
  }

  private async runScan(signal?: AbortSignal): Promise<InstalledEntry[]> {
    this.journal = [];
    try {
      const scannedEntries = await this.scanner(signal);
      const next = new IndexState();
      for (const entry of scannedEntries) {
        next.add(entry);
      }
      for (const mutation of this.journal) {
        mutation(next);
      }
      this.state = next;
      this.scanned = true;
      return this.entries();
    } finally {
      this.journal = null;
    }
  }
}
