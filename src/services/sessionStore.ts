import { StagedImage } from "../models";
import { KeyedQueue } from "../utils/keyedQueue";

export interface MessageHandle {
  chatId: number;
  messageId: number;
}

export interface Session {
  chatId: number;
  pending: StagedImage[];
  statusHandle: MessageHandle | null;
  updatedAt: number;
}

export interface AddResult {
  accepted: StagedImage[];
  /** Images over the batch limit; the caller still owns their files. */
  rejected: StagedImage[];
  pending: readonly StagedImage[];
}

export interface ExpiredSession {
  userId: number;
  chatId: number;
  images: StagedImage[];
}

/**
 * Per-user staging area. Every operation on a user's session runs under that
 * user's lock; sessions of different users never wait on each other.
 */
export class SessionStore {
  private readonly sessions = new Map<number, Session>();
  private readonly locks = new KeyedQueue<number>();
  private readonly maxBatchSize: number;

  constructor(maxBatchSize: number = 50) {
    this.maxBatchSize = maxBatchSize;
  }

  add(
    userId: number,
    chatId: number,
    images: readonly StagedImage[],
    now: number = Date.now()
  ): Promise<AddResult> {
    return this.locks.run(userId, async () => {
      const session = this.sessions.get(userId) ?? {
        chatId,
        pending: [],
        statusHandle: null,
        updatedAt: now,
      };
      const room = Math.max(0, this.maxBatchSize - session.pending.length);
      const accepted = images.slice(0, room);
      const rejected = images.slice(room);

      session.chatId = chatId;
      session.pending.push(...accepted);
      session.updatedAt = now;
      if (session.pending.length > 0) {
        this.sessions.set(userId, session);
      }

      return { accepted, rejected, pending: [...session.pending] };
    });
  }

  snapshot(userId: number): Promise<readonly StagedImage[]> {
    return this.locks.run(userId, async () => [...(this.sessions.get(userId)?.pending ?? [])]);
  }

  statusHandle(userId: number): Promise<MessageHandle | null> {
    return this.locks.run(userId, async () => this.sessions.get(userId)?.statusHandle ?? null);
  }

  setStatusHandle(userId: number, handle: MessageHandle | null): Promise<void> {
    return this.locks.run(userId, async () => {
      const session = this.sessions.get(userId);
      if (session) {
        session.statusHandle = handle;
      }
    });
  }

  /**
   * Detaches the pending batch and resets the status handle in one step.
   * The caller takes ownership of the returned images.
   */
  take(userId: number): Promise<StagedImage[]> {
    return this.locks.run(userId, async () => this.detach(userId));
  }

  /**
   * Empties the session. Returns the images that were still pending so the
   * caller can release their files.
   */
  clear(userId: number): Promise<StagedImage[]> {
    return this.locks.run(userId, async () => this.detach(userId));
  }

  /**
   * Drops sessions untouched for longer than `maxAgeMs`.
   */
  expireIdle(maxAgeMs: number, now: number = Date.now()): Promise<ExpiredSession[]> {
    return this.evict((session) => now - session.updatedAt > maxAgeMs);
  }

  /**
   * Drops every session.
   */
  drain(): Promise<ExpiredSession[]> {
    return this.evict(() => true);
  }

  get activeSessions(): number {
    return this.sessions.size;
  }

  private async evict(shouldEvict: (session: Session) => boolean): Promise<ExpiredSession[]> {
    const candidates = Array.from(this.sessions.keys());
    const evicted: ExpiredSession[] = [];
    for (const userId of candidates) {
      const dropped = await this.locks.run(userId, async () => {
        const session = this.sessions.get(userId);
        if (!session || !shouldEvict(session)) {
          return null;
        }
        return { userId, chatId: session.chatId, images: this.detach(userId) };
      });
      if (dropped) {
        evicted.push(dropped);
      }
    }
    return evicted;
  }

  private detach(userId: number): StagedImage[] {
    const session = this.sessions.get(userId);
    this.sessions.delete(userId);
    return session ? session.pending : [];
  }
}
