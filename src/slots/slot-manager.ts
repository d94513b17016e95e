/**
 * SlotManager - assigns one of `maxSlots` numbered slots to each task.
 *
 * Strategy:
 * 1. Hash the canonical repo path to find the repo's preferred slot
 * 2. Preferred slot free -> use it (slot-local caches get reused)
 * 3. Otherwise take the lowest free slot and make it the new preference
 * 4. No free slot -> AllSlotsBusyError
 *
 * Acquire and release run without yielding to the event loop, so the
 * occupancy and affinity maps are never observed half-updated.
 */

import { createHash } from 'crypto';
import { existsSync, mkdirSync, readFileSync, realpathSync, writeFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { AllSlotsBusyError } from '../errors.js';
import { logger } from '../utils/logger.js';

export const DEFAULT_MAX_SLOTS = 10;

export interface SlotManagerOptions {
  maxSlots?: number;
  /** Where the repo -> slot affinity map is persisted */
  assignmentsPath: string;
}

export class SlotManager {
  readonly maxSlots: number;
  private readonly assignmentsPath: string;

  /** repo path hash -> preferred slot (persisted) */
  private repoToSlot = new Map<string, number>();

  /** slot -> task id (in memory only) */
  private activeTasks = new Map<number, string>();

  constructor(options: SlotManagerOptions) {
    this.maxSlots = options.maxSlots ?? DEFAULT_MAX_SLOTS;
    this.assignmentsPath = options.assignmentsPath;
    this.load();
  }

  /**
   * Acquire a slot for `taskId`, preferring the slot last used for the repo.
   * @throws AllSlotsBusyError when every slot is occupied
   */
  acquireSlot(repoPath: string, taskId: string): number {
    const repoHash = hashRepoPath(repoPath);

    const preferred = this.repoToSlot.get(repoHash);
    if (preferred !== undefined && preferred <= this.maxSlots && !this.activeTasks.has(preferred)) {
      this.activeTasks.set(preferred, taskId);
      logger.info(`Task ${taskId}: acquired preferred slot ${preferred}`, { repoPath });
      return preferred;
    }

    for (let slot = 1; slot <= this.maxSlots; slot++) {
      if (!this.activeTasks.has(slot)) {
        this.activeTasks.set(slot, taskId);
        this.repoToSlot.set(repoHash, slot);
        this.persist();
        logger.info(`Task ${taskId}: acquired slot ${slot} (new affinity)`, { repoPath });
        return slot;
      }
    }

    logger.warn(`Task ${taskId}: all ${this.maxSlots} slots busy`, { repoPath });
    throw new AllSlotsBusyError(this.maxSlots, this.getActiveTasks());
  }

  /**
   * Release a slot. With `taskId`, the slot is only freed while that task
   * still holds it. Releasing a free slot is logged, not an error.
   */
  releaseSlot(slot: number, taskId?: string): void {
    const holder = this.activeTasks.get(slot);

    if (holder === undefined) {
      logger.warn(`Attempted to release unoccupied slot ${slot}`);
      return;
    }

    if (taskId !== undefined && holder !== taskId) {
      logger.warn(`Not releasing slot ${slot}: held by task ${holder}, not ${taskId}`);
      return;
    }

    this.activeTasks.delete(slot);
    logger.info(`Task ${holder}: released slot ${slot}`);
  }

  /** Copy of slot -> task id for occupied slots */
  getActiveTasks(): Record<number, string> {
    return Object.fromEntries(this.activeTasks);
  }

  getAvailableSlots(): number[] {
    const available: number[] = [];
    for (let slot = 1; slot <= this.maxSlots; slot++) {
      if (!this.activeTasks.has(slot)) {
        available.push(slot);
      }
    }
    return available;
  }

  getSlotForTask(taskId: string): number | null {
    for (const [slot, holder] of this.activeTasks) {
      if (holder === taskId) {
        return slot;
      }
    }
    return null;
  }

  private load(): void {
    if (!existsSync(this.assignmentsPath)) {
      return;
    }

    try {
      const data: unknown = JSON.parse(readFileSync(this.assignmentsPath, 'utf-8'));
      const mapping = isRecord(data) ? data.repo_to_slot : undefined;

      if (!isRecord(mapping)) {
        logger.warn(`Ignoring slot assignments without a repo_to_slot object: ${this.assignmentsPath}`);
        return;
      }

      for (const [hash, value] of Object.entries(mapping)) {
        const slot = Number(value);
        if (Number.isInteger(slot) && slot >= 1) {
          this.repoToSlot.set(hash, slot);
        }
      }

      logger.debug(`Loaded ${this.repoToSlot.size} slot affinity mappings`, { path: this.assignmentsPath });
    } catch (err) {
      logger.warn(`Failed to load slot assignments from ${this.assignmentsPath}`, {
        error: err instanceof Error ? err.message : String(err),
      });
      this.repoToSlot.clear();
    }
  }

  // A failed write leaves the acquisition in place
  private persist(): void {
    const data = { repo_to_slot: Object.fromEntries(this.repoToSlot) };
    try {
      mkdirSync(dirname(this.assignmentsPath), { recursive: true });
      writeFileSync(this.assignmentsPath, JSON.stringify(data, null, 2));
      logger.debug(`Persisted ${this.repoToSlot.size} slot affinity mappings`, { path: this.assignmentsPath });
    } catch (err) {
      logger.error(`Failed to persist slot assignments to ${this.assignmentsPath}`, {
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}

/**
 * Stable 16-hex-char key for a repository: SHA-256 of its symlink-resolved
 * absolute path (the plain absolute path when it does not exist).
 */
export function hashRepoPath(repoPath: string): string {
  let canonical: string;
  try {
    canonical = realpathSync(repoPath);
  } catch {
    canonical = resolve(repoPath);
  }
  return createHash('sha256').update(canonical).digest('hex').slice(0, 16);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
