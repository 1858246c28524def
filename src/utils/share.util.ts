import { randomInt, timingSafeEqual } from 'crypto';

export const SHARE_CODE_PATTERN = /^[0-9]{4}$/;

/** Default lifetime of a freshly issued share link. */
export const DEFAULT_SHARE_DAYS = 7;

/** Minimum lifetime of a presigned URL handed out for a share. */
export const MIN_SHARED_URL_SECONDS = 10 * 60;

/** Presigned URL lifetime for shares that never expire. */
export const PERMANENT_SHARED_URL_SECONDS = 24 * 60 * 60;

const DAY_MS = 24 * 60 * 60 * 1000;

export function isValidShareCode(code: string): boolean {
    return SHARE_CODE_PATTERN.test(code);
}

export function generateShareCode(): string {
    return randomInt(0, 10000).toString().padStart(4, '0');
}

export function addDays(from: Date, days: number): Date {
    return new Date(from.getTime() + days * DAY_MS);
}

/**
 * A share is live while it is flagged shared, has a link, and its
 * expiry (if any) is still in the future.
 */
export function isShareActive(
    share: { is_shared: boolean; share_uuid: string | null; share_expired_at: Date | null },
    now: Date = new Date()
): boolean {
    if (!share.is_shared || !share.share_uuid) {
        return false;
    }
    return share.share_expired_at === null || share.share_expired_at.getTime() > now.getTime();
}

export function isShareExpired(expiredAt: Date | null, now: Date = new Date()): boolean {
    return expiredAt !== null && expiredAt.getTime() < now.getTime();
}

/**
 * Lifetime of the presigned URL returned when a share is opened:
 * the rest of the share's life, never below ten minutes, and a day
 * for permanent shares.
 */
export function sharedUrlExpiry(expiredAt: Date | null, now: Date = new Date()): number {
    if (expiredAt === null) {
        return PERMANENT_SHARED_URL_SECONDS;
    }
    const remaining = Math.floor((expiredAt.getTime() - now.getTime()) / 1000);
    return Math.max(remaining, MIN_SHARED_URL_SECONDS);
}

export function shareCodesMatch(expected: string | null, provided: string): boolean {
    if (expected === null) {
        return false;
    }
    const a = Buffer.from(expected);
    const b = Buffer.from(provided);
    return a.length === b.length && timingSafeEqual(a, b);
}
