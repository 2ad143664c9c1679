import { ValidationError } from "../errors.js";

/** Calendar date in `YYYY-MM-DD` form, without time or zone. */
export type IsoDate = string;

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const MS_PER_DAY = 86_400_000;

function pad(value: number, width = 2): string {
	return String(value).padStart(width, "0");
}

function utcMidnight(year: number, monthIndex: number, day: number): Date {
	// setUTCFullYear keeps years below 100 literal; Date.UTC would map them to 19xx.
	const date = new Date(0);
	date.setUTCFullYear(year, monthIndex, day);
	return date;
}

function formatUtcDate(date: Date): IsoDate {
	return `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}

function toUtcDate(value: IsoDate): Date {
	const match = ISO_DATE_PATTERN.exec(value);
	if (!match) {
		throw new ValidationError(`Invalid date '${value}': expected YYYY-MM-DD`, "expiresAt");
	}
	const year = Number(match[1]);
	const month = Number(match[2]);
	const day = Number(match[3]);
	const date = utcMidnight(year, month - 1, day);
	if (
		month < 1 ||
		month > 12 ||
		date.getUTCFullYear() !== year ||
		date.getUTCMonth() !== month - 1 ||
		date.getUTCDate() !== day
	) {
		throw new ValidationError(`Invalid date '${value}': not a calendar date`, "expiresAt");
	}
	return date;
}

/**
 * Validate a `YYYY-MM-DD` string and return it unchanged.
 * Rejects out-of-range months and days, including February 29th outside leap years.
 */
export function parseIsoDate(value: string): IsoDate {
	toUtcDate(value);
	return value;
}

/**
 * Civil date of `now` in the process's local time zone.
 * Both the due filter and the message wording use this date.
 */
export function toLocalIsoDate(now: Date): IsoDate {
	return `${pad(now.getFullYear(), 4)}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
}

export function addDays(date: IsoDate, days: number): IsoDate {
	const base = toUtcDate(date);
	return formatUtcDate(new Date(base.getTime() + days * MS_PER_DAY));
}

/** Whole calendar days from `from` to `to`; negative when `to` is earlier. */
export function daysBetween(from: IsoDate, to: IsoDate): number {
	return Math.round((toUtcDate(to).getTime() - toUtcDate(from).getTime()) / MS_PER_DAY);
}
