export function nowMs(): number {
    return Date.now();
}

export function secondsToMs(seconds: number): number {
    return seconds * 1000;
}

/**
 * Whole seconds left until `expiresAt`, rounded up so a cookie never outlives
 * its session by less than a second. Never negative.
 */
export function secondsUntil(expiresAt: number, now: number = nowMs()): number {
    return Math.max(0, Math.ceil((expiresAt - now) / 1000));
}
