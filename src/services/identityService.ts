import { z } from 'zod';
import { TidyhqApi, toGroupRecord, toMemberRecord } from './tidyhqService';
import { CacheSnapshot, MemberRecord } from '../types';
import { ExternalServiceError } from '../types/errors';
import { AtomicJsonWriter, ensureDirectory, readJsonFile } from '../utils/jsonFile';

const CacheSnapshotSchema = z.object({
  refreshedAt: z.number(),
  members: z.array(
    z.object({
      id: z.string(),
      name: z.string(),
      groups: z.array(z.string()),
      slackId: z.string().optional()
    })
  ),
  groups: z.array(z.object({ id: z.string(), label: z.string() }))
});

export interface IdentityServiceOptions {
  client: TidyhqApi;
  filePath: string;
  expirySeconds: number;
  slackFieldId: string;
  now?: () => number;
}

/**
 * Read-through cache of TidyHQ contacts and groups.
 *
 * A refresh replaces the whole snapshot at once, on disk and in memory, so a
 * reader sees either the previous snapshot or the new one. Callers that arrive
 * while a refresh is running share it.
 */
export class IdentityService {
  private client: TidyhqApi;
  private filePath: string;
  private expiryMs: number;
  private slackFieldId: string;
  private now: () => number;
  private writer: AtomicJsonWriter;

  private snapshot: CacheSnapshot | null = null;
  private bySlackId = new Map<string, MemberRecord>();
  private byId = new Map<string, MemberRecord>();
  private inflight: Promise<CacheSnapshot> | null = null;

  constructor(options: IdentityServiceOptions) {
    this.client = options.client;
    this.filePath = options.filePath;
    this.expiryMs = options.expirySeconds * 1000;
    this.slackFieldId = options.slackFieldId;
    this.now = options.now ?? Date.now;
    this.writer = new AtomicJsonWriter(options.filePath);
  }

  /**
   * Load a snapshot left by an earlier run. Returns whether one was loaded.
   */
  loadSnapshot(): boolean {
    let raw: unknown;
    try {
      raw = readJsonFile(this.filePath);
    } catch (error) {
      console.warn(`Ignoring unreadable TidyHQ cache ${this.filePath}:`, error);
      return false;
    }

    if (raw === undefined) {
      return false;
    }

    const parsed = CacheSnapshotSchema.safeParse(raw);
    if (!parsed.success) {
      console.warn(`Ignoring malformed TidyHQ cache ${this.filePath}`);
      return false;
    }

    this.setSnapshot(parsed.data);
    return true;
  }

  private setSnapshot(snapshot: CacheSnapshot): void {
    const bySlackId = new Map<string, MemberRecord>();
    const byId = new Map<string, MemberRecord>();
    for (const member of snapshot.members) {
      byId.set(member.id, member);
      if (member.slackId) {
        bySlackId.set(member.slackId, member);
      }
    }

    this.snapshot = snapshot;
    this.bySlackId = bySlackId;
    this.byId = byId;
  }

  isExpired(): boolean {
    return !this.snapshot || this.now() - this.snapshot.refreshedAt >= this.expiryMs;
  }

  /**
   * Fetch everything from TidyHQ and replace the snapshot
   */
  refresh(): Promise<CacheSnapshot> {
    if (!this.inflight) {
      this.inflight = this.fetchSnapshot().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  private async fetchSnapshot(): Promise<CacheSnapshot> {
    let snapshot: CacheSnapshot;
    try {
      const [contacts, groups] = await Promise.all([this.client.getContacts(), this.client.getGroups()]);
      snapshot = {
        refreshedAt: this.now(),
        members: contacts.map(contact => toMemberRecord(contact, this.slackFieldId)),
        groups: groups.map(toGroupRecord)
      };
    } catch (error) {
      if (error instanceof ExternalServiceError) throw error;
      const reason = error instanceof Error ? error.message : String(error);
      throw new ExternalServiceError(`TidyHQ refresh failed: ${reason}`);
    }

    try {
      ensureDirectory(this.filePath);
      await this.writer.write(() => snapshot);
    } catch (error) {
      // the in-memory snapshot is still usable
      console.error('Error writing TidyHQ cache:', error);
    }

    this.setSnapshot(snapshot);
    console.log(`TidyHQ cache refreshed: ${snapshot.members.length} contacts, ${snapshot.groups.length} groups`);
    return snapshot;
  }

  /**
   * Refresh if the snapshot is missing or expired. Without any snapshot a
   * failed refresh is thrown; otherwise stale data is served until the next
   * access past expiry tries again.
   */
  async ensureFresh(): Promise<CacheSnapshot> {
    if (this.snapshot && !this.isExpired()) {
      return this.snapshot;
    }

    try {
      return await this.refresh();
    } catch (error) {
      if (!this.snapshot) {
        throw error;
      }
      console.warn('TidyHQ refresh failed, serving cached data:', error);
      return this.snapshot;
    }
  }

  /**
   * Map a Slack user to their TidyHQ member record
   */
  async resolve(slackUserId: string): Promise<MemberRecord | undefined> {
    await this.ensureFresh();
    return this.bySlackId.get(slackUserId.trim());
  }

  getMember(memberId: string): MemberRecord | undefined {
    return this.byId.get(memberId);
  }

  /**
   * Cached member, or a live contact lookup when the contact is newer than the cache
   */
  async findMember(memberId: string): Promise<MemberRecord | undefined> {
    const cached = this.getMember(memberId);
    if (cached) {
      return cached;
    }

    const contact = await this.client.getContact(memberId);
    return contact ? toMemberRecord(contact, this.slackFieldId) : undefined;
  }

  isInGroups(memberId: string, groupIds: readonly string[]): boolean {
    const member = this.getMember(memberId);
    return member ? member.groups.some(group => groupIds.includes(group)) : false;
  }
}

export const createIdentityService = (options: IdentityServiceOptions): IdentityService => {
  return new IdentityService(options);
};
