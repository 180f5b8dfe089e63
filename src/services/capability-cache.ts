import { mkdir, readFile, rename, rm, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type {
  CacheReadSource,
  CapabilityCacheEntry,
  CapabilityCacheStatus,
  CapabilityMap,
  DetectionHistoryItem,
} from '../types/routing.js';
import { logThought, scrubSensitiveText } from '../utils/logger.js';
import { Mutex } from '../utils/mutex.js';

export interface CapabilityCacheOptions {
  cacheFile: string;
  ttlSeconds: number;
  maxHistory?: number;
  now?: () => number;
}

const DEFAULT_MAX_HISTORY = 10;
const INVALIDATION_OFFSET_MS = 60 * 60 * 1_000;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function booleanEntries(value: unknown): Record<string, boolean> {
  const result: Record<string, boolean> = {};
  if (!isRecord(value)) return result;
  for (const [key, flag] of Object.entries(value)) {
    if (typeof flag === 'boolean') result[key] = flag;
  }
  return result;
}

function errorMessage(error: unknown): string {
  return scrubSensitiveText(error instanceof Error ? error.message : String(error));
}

/**
 * Validate a cache document read from disk. Non-boolean capability values and
 * malformed history items are dropped; an unparsable `last_updated` rejects the
 * whole entry.
 */
export function parseCacheEntry(raw: unknown, defaultTtlSeconds: number): CapabilityCacheEntry | null {
  if (!isRecord(raw)) return null;

  const lastUpdated = raw.last_updated;
  if (typeof lastUpdated !== 'string' || !Number.isFinite(Date.parse(lastUpdated))) return null;

  const ttl = raw.ttl_seconds;
  const history: DetectionHistoryItem[] = [];
  if (Array.isArray(raw.detection_history)) {
    for (const item of raw.detection_history) {
      if (isRecord(item) && typeof item.timestamp === 'string') {
        history.push({ timestamp: item.timestamp, capabilities: booleanEntries(item.capabilities) });
      }
    }
  }

  return {
    last_updated: lastUpdated,
    ttl_seconds: typeof ttl === 'number' && Number.isFinite(ttl) && ttl > 0 ? ttl : defaultTtlSeconds,
    capabilities: booleanEntries(raw.capabilities),
    detection_history: history,
  };
}

/**
 * Capability verdicts with a TTL, stored in a JSON file and mirrored in memory.
 * The file wins when readable and fresh; the mirror covers unreadable or stale
 * files. Storage failures are logged and read as a miss.
 */
export class CapabilityCache {
  private readonly cacheFile: string;
  private readonly ttlSeconds: number;
  private readonly maxHistory: number;
  private readonly nowFn: () => number;
  private readonly mutex = new Mutex();
  private memoryEntry: CapabilityCacheEntry | null = null;
  private lastReadSource: CacheReadSource | null = null;

  constructor(options: CapabilityCacheOptions) {
    this.cacheFile = path.resolve(options.cacheFile);
    this.ttlSeconds = options.ttlSeconds;
    this.maxHistory = Math.max(1, options.maxHistory ?? DEFAULT_MAX_HISTORY);
    this.nowFn = options.now ?? (() => Date.now());
  }

  public get defaultTtlSeconds(): number {
    return this.ttlSeconds;
  }

  public get lastReadWasHit(): boolean {
    return this.lastReadSource !== null;
  }

  public getLastReadSource(): CacheReadSource | null {
    return this.lastReadSource;
  }

  public async getCapabilities(): Promise<CapabilityMap | null> {
    const fileEntry = await this.readFileEntry();
    if (fileEntry && this.isValid(fileEntry)) {
      this.lastReadSource = 'file';
      return { ...fileEntry.capabilities };
    }

    const memoryEntry = this.memoryEntry;
    if (memoryEntry && this.isValid(memoryEntry)) {
      this.lastReadSource = 'memory';
      return { ...memoryEntry.capabilities };
    }

    this.lastReadSource = null;
    return null;
  }

  /** Returns false when the file write failed; the in-memory mirror is updated either way. */
  public async setCapabilities(capabilities: CapabilityMap, ttlSeconds?: number): Promise<boolean> {
    return this.mutex.runExclusive(async () => {
      const timestamp = new Date(this.nowFn()).toISOString();
      const clean = booleanEntries(capabilities);
      const previous = this.memoryEntry ?? (await this.readFileEntry());
      const history = [...(previous?.detection_history ?? []), { timestamp, capabilities: { ...clean } }];

      const entry: CapabilityCacheEntry = {
        last_updated: timestamp,
        ttl_seconds: ttlSeconds ?? this.ttlSeconds,
        capabilities: clean,
        detection_history: history.slice(-this.maxHistory),
      };

      this.memoryEntry = entry;
      return this.writeFileEntry(entry);
    });
  }

  /**
   * Ages the entry past its own TTL (by at least an hour) while keeping
   * capabilities and history for inspection.
   */
  public async invalidateCache(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      const fileEntry = await this.readFileEntry();
      if (fileEntry) {
        await this.writeFileEntry({ ...fileEntry, last_updated: this.expiredTimestamp(fileEntry) });
      }
      if (this.memoryEntry) {
        this.memoryEntry = { ...this.memoryEntry, last_updated: this.expiredTimestamp(this.memoryEntry) };
      }
    });
    void logThought('[CapabilityCache] Capability cache invalidated.');
  }

  public async clearCache(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      this.memoryEntry = null;
      try {
        await rm(this.cacheFile, { force: true });
      } catch (error) {
        console.warn(`[CapabilityCache] Failed to delete ${this.cacheFile}: ${errorMessage(error)}`);
      }
    });
  }

  public async getCacheAgeSeconds(): Promise<number | null> {
    const entry = (await this.readFileEntry()) ?? this.memoryEntry;
    if (!entry) return null;
    return (this.nowFn() - Date.parse(entry.last_updated)) / 1_000;
  }

  /**
   * Re-detects when the entry is missing or older than `maxAgeSeconds`. A failed
   * detection returns the last known capabilities, stale or not.
   */
  public async refreshCacheIfNeeded(
    detect: () => Promise<CapabilityMap>,
    maxAgeSeconds = this.ttlSeconds,
  ): Promise<CapabilityMap> {
    const age = await this.getCacheAgeSeconds();
    if (age === null || age > maxAgeSeconds) {
      try {
        const capabilities = await detect();
        await this.setCapabilities(capabilities);
        return capabilities;
      } catch (error) {
        console.warn(`[CapabilityCache] Refresh failed, serving last known capabilities: ${errorMessage(error)}`);
        return (await this.lastKnownCapabilities()) ?? {};
      }
    }

    return (await this.getCapabilities()) ?? (await this.lastKnownCapabilities()) ?? {};
  }

  public async getCacheStatus(): Promise<CapabilityCacheStatus> {
    const status: CapabilityCacheStatus = {
      cacheFile: this.cacheFile,
      fileExists: false,
      fileSizeBytes: null,
      fileModified: null,
      fileCacheValid: null,
      fileLastUpdated: null,
      fileTtlSeconds: null,
      fileError: null,
      memoryCacheActive: this.memoryEntry !== null,
      memoryCacheValid: this.memoryEntry ? this.isValid(this.memoryEntry) : null,
      memoryLastUpdated: this.memoryEntry?.last_updated ?? null,
      memoryTtlSeconds: this.memoryEntry?.ttl_seconds ?? null,
      defaultTtlSeconds: this.ttlSeconds,
    };

    try {
      const info = await stat(this.cacheFile);
      status.fileExists = true;
      status.fileSizeBytes = info.size;
      status.fileModified = info.mtime.toISOString();
    } catch (error) {
      if (!isMissingFile(error)) status.fileError = errorMessage(error);
      return status;
    }

    try {
      const entry = parseCacheEntry(JSON.parse(await readFile(this.cacheFile, 'utf8')), this.ttlSeconds);
      if (entry) {
        status.fileCacheValid = this.isValid(entry);
        status.fileLastUpdated = entry.last_updated;
        status.fileTtlSeconds = entry.ttl_seconds;
      } else {
        status.fileCacheValid = false;
        status.fileError = 'Malformed cache entry';
      }
    } catch (error) {
      status.fileCacheValid = false;
      status.fileError = errorMessage(error);
    }
    return status;
  }

  private expiredTimestamp(entry: CapabilityCacheEntry): string {
    const offsetMs = Math.max(INVALIDATION_OFFSET_MS, entry.ttl_seconds * 1_000 + 1_000);
    return new Date(this.nowFn() - offsetMs).toISOString();
  }

  private isValid(entry: CapabilityCacheEntry): boolean {
    const ageMs = this.nowFn() - Date.parse(entry.last_updated);
    return ageMs < entry.ttl_seconds * 1_000;
  }

  private async lastKnownCapabilities(): Promise<CapabilityMap | null> {
    const entry = (await this.readFileEntry()) ?? this.memoryEntry;
    return entry ? { ...entry.capabilities } : null;
  }

  private async readFileEntry(): Promise<CapabilityCacheEntry | null> {
    let raw: string;
    try {
      raw = await readFile(this.cacheFile, 'utf8');
    } catch (error) {
      if (!isMissingFile(error)) {
        console.warn(`[CapabilityCache] Failed to read ${this.cacheFile}: ${errorMessage(error)}`);
      }
      return null;
    }

    try {
      const entry = parseCacheEntry(JSON.parse(raw), this.ttlSeconds);
      if (!entry) console.warn(`[CapabilityCache] Ignoring malformed cache file ${this.cacheFile}.`);
      return entry;
    } catch (error) {
      console.warn(`[CapabilityCache] Ignoring unparsable cache file ${this.cacheFile}: ${errorMessage(error)}`);
      return null;
    }
  }

  private async writeFileEntry(entry: CapabilityCacheEntry): Promise<boolean> {
    const tempPath = `${this.cacheFile}.${process.pid}.${Date.now()}.tmp`;
    try {
      await mkdir(path.dirname(this.cacheFile), { recursive: true });
      await writeFile(tempPath, JSON.stringify(entry, null, 2), 'utf8');
      await rename(tempPath, this.cacheFile);
      return true;
    } catch (error) {
      const message = errorMessage(error);
      console.warn(`[CapabilityCache] Failed to write ${this.cacheFile}: ${message}`);
      void logThought(`[CapabilityCache] Cache write failed; continuing with the in-memory mirror. ${message}`);
      await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        console.warn(`[CapabilityCache] Failed to remove temp file ${tempPath}: ${errorMessage(cleanupError)}`);
      });
      return false;
    }
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
