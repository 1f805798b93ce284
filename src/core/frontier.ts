/**
 * Crawl frontier: FIFO queue of (url, depth) items plus the visited set
 *
 * Every mutation runs synchronously, so the visited check and the enqueue
 * cannot interleave with another worker. A URL enters the queue at most once
 * for the lifetime of the frontier.
 */

import { FrontierItem } from '../types/crawl.types';
import { normalizeUrl } from './urlNormalizer';

export type PopResult =
  | { kind: 'item'; item: FrontierItem }
  | { kind: 'empty' }
  | { kind: 'timeout' };

interface Waiter {
  resolve: (result: PopResult) => void;
  timer: NodeJS.Timeout;
}

export class Frontier {
  private readonly queue: FrontierItem[] = [];
  private head = 0;
  private readonly visited = new Set<string>();
  private readonly waiters: Waiter[] = [];
  private inFlightCount = 0;
  private closed = false;

  constructor(readonly maxDepth: number) {}

  /**
   * Insert the depth-0 item
   *
   * @returns false when the URL cannot be normalized or was already seen
   */
  seed(url: string): boolean {
    let normalized: string;
    try {
      normalized = normalizeUrl(url);
    } catch {
      return false;
    }
    return this.tryPush(normalized, 0);
  }

  /**
   * Enqueue an already-normalized URL unless it is too deep or already seen
   */
  tryPush(url: string, depth: number): boolean {
    if (this.closed || depth > this.maxDepth || this.visited.has(url)) {
      return false;
    }

    this.visited.add(url);
    this.queue.push({ url, depth });
    this.wakeOne();
    return true;
  }

  /**
   * Take the next item
   *
   * Returns 'empty' once nothing is queued and nothing is in flight; that state
   * is permanent because only in-flight items can push new work. Otherwise
   * waits up to waitMs for work to appear and returns 'timeout'.
   */
  pop(waitMs: number): Promise<PopResult> {
    const immediate = this.takeNow();
    if (immediate) return Promise.resolve(immediate);

    return new Promise<PopResult>((resolve) => {
      const waiter: Waiter = {
        resolve,
        timer: setTimeout(() => {
          this.removeWaiter(waiter);
          resolve({ kind: 'timeout' });
        }, waitMs),
      };
      this.waiters.push(waiter);
    });
  }

  /**
   * Mark a popped item as finished
   */
  complete(item: FrontierItem): void {
    if (this.inFlightCount === 0) {
      throw new Error(`complete() called for ${item.url} with nothing in flight`);
    }
    this.inFlightCount--;
    if (this.isDrained) {
      this.releaseAll();
    }
  }

  /**
   * Drop pending items and release every waiter
   */
  close(): void {
    this.closed = true;
    this.queue.length = 0;
    this.head = 0;
    this.releaseAll();
  }

  get size(): number {
    return this.queue.length - this.head;
  }

  get inFlight(): number {
    return this.inFlightCount;
  }

  get visitedCount(): number {
    return this.visited.size;
  }

  get isDrained(): boolean {
    return this.size === 0 && this.inFlightCount === 0;
  }

  hasSeen(url: string): boolean {
    return this.visited.has(url);
  }

  private takeNow(): PopResult | null {
    if (this.size > 0) {
      const item = this.queue[this.head];
      this.head++;
      this.compact();
      this.inFlightCount++;
      return { kind: 'item', item };
    }
    if (this.closed || this.inFlightCount === 0) {
      return { kind: 'empty' };
    }
    return null;
  }

  // Reclaim the consumed prefix once it dominates the array
  private compact(): void {
    if (this.head > 1024 && this.head * 2 > this.queue.length) {
      this.queue.splice(0, this.head);
      this.head = 0;
    }
  }

  private wakeOne(): void {
    const waiter = this.waiters.shift();
    if (!waiter) return;
    clearTimeout(waiter.timer);
    const result = this.takeNow();
    // takeNow cannot return null right after a push
    waiter.resolve(result ?? { kind: 'timeout' });
  }

  private releaseAll(): void {
    const waiters = this.waiters.splice(0, this.waiters.length);
    for (const waiter of waiters) {
      clearTimeout(waiter.timer);
      waiter.resolve({ kind: 'empty' });
    }
  }

  private removeWaiter(waiter: Waiter): void {
    const index = this.waiters.indexOf(waiter);
    if (index !== -1) this.waiters.splice(index, 1);
  }
}
