import { type IsoDate, addDays, daysBetween } from "./dates.js";
import type { ExpiryNotice, TrackedToken } from "./types.js";

export function daysRemaining(expiresAt: IsoDate, today: IsoDate): number {
	return daysBetween(today, expiresAt);
}

/** A token is due once its expiry falls on or before today + `thresholdDays`. */
export function isDue(token: TrackedToken, today: IsoDate, thresholdDays: number): boolean {
	return token.expiresAt <= addDays(today, thresholdDays);
}

export function formatExpiryMessage(token: TrackedToken, today: IsoDate): string {
	const days = daysRemaining(token.expiresAt, today);
	if (days <= 0) {
		return `🚨 Token '${token.name}' has EXPIRED!`;
	}
	return `⚠️ Token '${token.name}' will expire in ${days} day${days > 1 ? "s" : ""}!`;
}

export function describeExpiry(token: TrackedToken, today: IsoDate): ExpiryNotice {
	const days = daysRemaining(token.expiresAt, today);
	return {
		token,
		daysRemaining: days,
		expired: days <= 0,
		message: formatExpiryMessage(token, today),
	};
}
