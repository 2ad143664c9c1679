import type { IsoDate } from "./dates.js";

export type TrackedToken = {
	name: string;
	expiresAt: IsoDate;
	/** Epoch ms of the last successful notification; null until one is sent. */
	lastNotifiedAtMs: number | null;
};

export type ExpiryNotice = {
	token: TrackedToken;
	daysRemaining: number;
	expired: boolean;
	message: string;
};
