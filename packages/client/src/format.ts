/**
 * SYSLOG message encoding.
 *
 * Pure: identical fields always produce identical bytes. No escaping is
 * applied; message IDs and structured data must already be valid for the
 * chosen variant.
 */

import type { ResolvedBomMode, ResolvedFraming, ResolvedProtocol } from './protocol.js';

/** UTF-8 byte order mark */
export const BOM = '\uFEFF';

const NILVALUE = '-';

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

export interface FormatFields {
	protocol: ResolvedProtocol;
	framing: ResolvedFraming;
	bom: ResolvedBomMode;
	pri: number;
	timestamp: Date;
	/** Offset from UTC, in minutes east, that timestamps are rendered in. Defaults to 0 (UTC). */
	utcOffsetMinutes?: number;
	hostName: string;
	processName: string;
	processId: number;
	messageId?: string;
	body: string;
	structuredData?: string;
}

// ─── Timestamps ──────────────────────────────────────────────────────────────

function pad2(n: number): string {
	return String(n).padStart(2, '0');
}

function shift(time: Date, utcOffsetMinutes: number): Date {
	return new Date(time.getTime() + utcOffsetMinutes * 60_000);
}

/**
 * Old-style timestamp: `Mmm _d hh:mm:ss`. No year, no zone, and the day is
 * space-padded.
 */
export function formatStamp(time: Date, utcOffsetMinutes = 0): string {
	const t = shift(time, utcOffsetMinutes);
	const day = String(t.getUTCDate()).padStart(2, ' ');
	return `${MONTHS[t.getUTCMonth()]} ${day} ${pad2(t.getUTCHours())}:${pad2(t.getUTCMinutes())}:${pad2(t.getUTCSeconds())}`;
}

/**
 * RFC 3339 timestamp with trailing zeros trimmed from the fractional
 * seconds, and `Z` or a signed `hh:mm` offset.
 */
export function formatRfc3339(time: Date, utcOffsetMinutes = 0): string {
	const t = shift(time, utcOffsetMinutes);
	const date = `${String(t.getUTCFullYear()).padStart(4, '0')}-${pad2(t.getUTCMonth() + 1)}-${pad2(t.getUTCDate())}`;
	const clock = `${pad2(t.getUTCHours())}:${pad2(t.getUTCMinutes())}:${pad2(t.getUTCSeconds())}`;

	const ms = t.getUTCMilliseconds();
	const fraction = ms === 0 ? '' : `.${String(ms).padStart(3, '0').replace(/0+$/, '')}`;

	let zone = 'Z';
	if (utcOffsetMinutes !== 0) {
		const sign = utcOffsetMinutes > 0 ? '+' : '-';
		const abs = Math.abs(utcOffsetMinutes);
		zone = `${sign}${pad2(Math.floor(abs / 60))}:${pad2(abs % 60)}`;
	}

	return `${date}T${clock}${fraction}${zone}`;
}

// ─── Messages ────────────────────────────────────────────────────────────────

function assemble(fields: FormatFields): string {
	const hostName = fields.hostName || NILVALUE;
	const processName = fields.processName || NILVALUE;
	const structuredData = fields.structuredData || NILVALUE;
	const offset = fields.utcOffsetMinutes ?? 0;
	const bom = fields.bom === 'always' ? BOM : '';
	const pid = fields.processId;

	switch (fields.protocol) {
		case 'v0-local': {
			// The message ID is folded into the body, so the BOM precedes it.
			const id = fields.messageId ? `${fields.messageId} ` : '';
			return `<${fields.pri}>${formatStamp(fields.timestamp, offset)} ${processName}[${pid}]: ${bom}${id}${fields.body}`;
		}
		case 'v0-net': {
			const id = fields.messageId ? `${fields.messageId} ` : '';
			return `<${fields.pri}>${formatStamp(fields.timestamp, offset)} ${hostName} ${processName}[${pid}]: ${bom}${id}${fields.body}`;
		}
		case 'v1-net': {
			const id = fields.messageId || NILVALUE;
			return `<${fields.pri}>1 ${formatRfc3339(fields.timestamp, offset)} ${hostName} ${processName} ${pid} ${id} ${structuredData} ${bom}${fields.body}`;
		}
		default: {
			const unknown: never = fields.protocol;
			throw new Error(`unknown syslog protocol: ${String(unknown)}`);
		}
	}
}

function delimiter(framing: ResolvedFraming): string {
	switch (framing) {
		case 'nul':
			return '\x00';
		case 'lf':
			return '\n';
		default:
			return '';
	}
}

/** Encode one message, framing included, as the exact bytes to put on the wire. */
export function formatMessage(fields: FormatFields): Buffer {
	const payload = Buffer.from(assemble(fields) + delimiter(fields.framing), 'utf-8');
	if (fields.framing !== 'length') {
		return payload;
	}
	// RFC 6587 octet counting: "<len> <payload>" with no trailing delimiter
	return Buffer.concat([Buffer.from(`${payload.length} `, 'ascii'), payload]);
}
