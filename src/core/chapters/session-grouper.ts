/**
 * Session Grouper - Pure Functions
 *
 * Chapters of one recording share the same embedded creation time, truncated
 * to the second. Exact match only: chapters stamped one second apart land in
 * different sessions.
 */

import type { ChapterRecord, SessionKey } from '../../types';

/**
 * Session key for an instant: whole seconds since the epoch
 */
export function toSessionKey(creationTime: Date): SessionKey {
  return Math.floor(creationTime.getTime() / 1000);
}

/**
 * Render a session key as YYYY-MM-DD HH:MM:SS (UTC) for logs
 */
export function formatSessionKey(key: SessionKey): string {
  return new Date(key * 1000).toISOString().slice(0, 19).replace('T', ' ');
}

/**
 * Bucket records into sessions.
 *
 * Every record appears in exactly one group. Groups iterate in the order their
 * first record was encountered; member order follows input order.
 */
export function groupChaptersBySession(
  records: readonly ChapterRecord[]
): ReadonlyMap<SessionKey, readonly ChapterRecord[]> {
  const groups = new Map<SessionKey, ChapterRecord[]>();

  for (const record of records) {
    const key = toSessionKey(record.embeddedCreationTime);
    const members = groups.get(key);
    if (members) {
      members.push(record);
    } else {
      groups.set(key, [record]);
    }
  }

  return groups;
}
