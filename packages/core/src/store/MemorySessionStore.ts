import { z } from "zod";
import { parseOptions, resolveStoreOptions, type StoreOptions, type StoreOptionsInput } from "../config";
import { LatchkeyError, type Logger } from "../errors";
import { decodePayload, encodePayload } from "../session/SessionSerializer";
import { newSessionId, withFreshSessionId, type SessionIdGenerator } from "../session/SessionId";
import { nowMs, secondsToMs } from "../utils/time";
import { ExpirySweeper } from "./ExpirySweeper";
import type { SessionData, SessionRecord, SessionStore } from "./SessionStore";

type Entry = {
    raw: string;
    createdAt: number;
    lastAccessedAt: number;
    expiresAt: number;
};

type Partition = Map<string, Entry>;

const DEFAULT_PARTITIONS = 16;
const DEFAULT_CLEANUP_INTERVAL_SECONDS = 60;

const memoryOptionsSchema = z.object({
    partitions: z.number().int().min(1).max(1024).default(DEFAULT_PARTITIONS),
    // 0 disables the sweep
    cleanupIntervalSeconds: z.number().nonnegative().finite().default(DEFAULT_CLEANUP_INTERVAL_SECONDS),
});

export type MemorySessionStoreOptions = StoreOptionsInput &
    z.input<typeof memoryOptionsSchema> & {
        generateId?: SessionIdGenerator;
        logger?: Logger;
    };

/**
 * In-process {@link SessionStore}.
 *
 * Sessions are spread over independent partitions by a hash of their id. No
 * operation awaits between reading and writing its partition, so operations on
 * one id are serialized by the event loop and never interleave.
 */
export class MemorySessionStore implements SessionStore {
    private readonly partitions: Partition[];
    private readonly sweeper: ExpirySweeper | null;
    private readonly settings: StoreOptions;
    private readonly generateId: SessionIdGenerator;
    private readonly logger: Logger | undefined;

    constructor(options?: MemorySessionStoreOptions) {
        this.settings = resolveStoreOptions(options);
        const { partitions, cleanupIntervalSeconds } = parseOptions(
            memoryOptionsSchema,
            options,
            "memory store options"
        );
        this.generateId = options?.generateId ?? newSessionId;
        this.logger = options?.logger;

        this.partitions = Array.from({ length: partitions }, () => new Map<string, Entry>());

        this.sweeper =
            cleanupIntervalSeconds > 0
                ? new ExpirySweeper(() => this.sweepExpired(), {
                      intervalSeconds: cleanupIntervalSeconds,
                      label: "memory",
                      ...(this.logger ? { logger: this.logger } : {}),
                  })
                : null;
        this.sweeper?.start();
    }

    /** Number of stored entries, expired ones included until swept. */
    get size(): number {
        return this.partitions.reduce((total, partition) => total + partition.size, 0);
    }

    async create(payload: SessionData, ttlSeconds?: number): Promise<SessionRecord> {
        const raw = encodePayload(payload, this.settings.maxPayloadBytes);
        const ttl = ttlSeconds ?? this.settings.ttlSeconds;

        return withFreshSessionId(
            this.generateId,
            async (sessionId) => {
                const partition = this.partitionOf(sessionId);
                const now = nowMs();
                const existing = partition.get(sessionId);
                if (existing && now < existing.expiresAt) return null;

                const entry: Entry = { raw, createdAt: now, lastAccessedAt: now, expiresAt: now + secondsToMs(ttl) };
                partition.set(sessionId, entry);
                return toRecord(sessionId, entry);
            },
            this.logger
        );
    }

    async load(sessionId: string): Promise<SessionRecord | null> {
        const partition = this.partitionOf(sessionId);
        const entry = partition.get(sessionId);
        if (!entry) return null;

        const now = nowMs();
        if (now >= entry.expiresAt) {
            partition.delete(sessionId);
            return null;
        }

        if (this.settings.slidingExpiration) {
            entry.lastAccessedAt = now;
            entry.expiresAt = now + secondsToMs(this.settings.ttlSeconds);
        }
        return toRecord(sessionId, entry);
    }

    async save(record: SessionRecord): Promise<void> {
        const raw = encodePayload(record.payload, this.settings.maxPayloadBytes);
        const partition = this.partitionOf(record.id);
        const entry = partition.get(record.id);
        const now = nowMs();

        if (!entry || now >= entry.expiresAt || now >= record.expiresAt) {
            if (entry && now >= entry.expiresAt) partition.delete(record.id);
            throw notFound(record.id);
        }

        partition.set(record.id, {
            raw,
            createdAt: entry.createdAt,
            lastAccessedAt: now,
            expiresAt: record.expiresAt,
        });
    }

    async remove(sessionId: string): Promise<void> {
        this.partitionOf(sessionId).delete(sessionId);
    }

    async touch(sessionId: string, ttlSeconds?: number): Promise<number | null> {
        const partition = this.partitionOf(sessionId);
        const entry = partition.get(sessionId);
        if (!entry) return null;

        const now = nowMs();
        if (now >= entry.expiresAt) {
            partition.delete(sessionId);
            return null;
        }

        entry.expiresAt = now + secondsToMs(ttlSeconds ?? this.settings.ttlSeconds);
        entry.lastAccessedAt = now;
        return entry.expiresAt;
    }

    async close(): Promise<void> {
        await this.sweeper?.stop();
        for (const partition of this.partitions) partition.clear();
    }

    /**
     * Drops every expired entry. Runs on the sweep timer; exposed for callers that
     * schedule reclamation themselves.
     */
    sweepExpired(): number {
        const now = nowMs();
        let removed = 0;
        for (const partition of this.partitions) {
            for (const [sessionId, entry] of partition) {
                if (now >= entry.expiresAt) {
                    partition.delete(sessionId);
                    removed += 1;
                }
            }
        }
        return removed;
    }

    private partitionOf(sessionId: string): Partition {
        const partition = this.partitions[fnv1a(sessionId) % this.partitions.length];
        if (!partition) throw new LatchkeyError("INTERNAL_ERROR", "Session partition out of range.");
        return partition;
    }
}

function toRecord(sessionId: string, entry: Entry): SessionRecord {
    return {
        id: sessionId,
        payload: decodePayload(entry.raw),
        createdAt: entry.createdAt,
        lastAccessedAt: entry.lastAccessedAt,
        expiresAt: entry.expiresAt,
        status: "active",
    };
}

function notFound(sessionId: string): LatchkeyError {
    return new LatchkeyError("NOT_FOUND", "Session no longer exists.", undefined, { sessionId });
}

// 32-bit FNV-1a over UTF-16 code units.
function fnv1a(value: string): number {
    let hash = 0x811c9dc5;
    for (let i = 0; i < value.length; i++) {
        hash ^= value.charCodeAt(i);
        hash = Math.imul(hash, 0x01000193);
    }
    return hash >>> 0;
}
