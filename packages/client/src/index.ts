/**
 * @syslogkit/client: SYSLOG protocol client.
 */

export type { Message, SyslogClientConfig, WriteOptions } from './client.js';
export { SyslogClient } from './client.js';

export type { BackoffConfig, BackoffOptions, BackoffPolicy, BackoffStrategy } from './backoff.js';
export { createBackoff, ExponentialBackoff, FixedBackoff, LinearBackoff } from './backoff.js';

export type { DialFunction, SyslogConnection } from './dial.js';
export { DatagramConnection, defaultDial, StreamConnection } from './dial.js';

export {
	BackoffError,
	ClosedError,
	ConfigurationError,
	ConnectError,
	ParseError,
	SyslogError,
	WriteError,
} from './errors.js';

export type { FormatFields } from './format.js';
export { BOM, formatMessage, formatRfc3339, formatStamp } from './format.js';

export type { PlatformCapability } from './platform.js';
export { detectPlatform, noLocalSockets, unixPlatform } from './platform.js';

export type { ParseResult } from './pri.js';
export {
	Facility,
	facilityName,
	facilityNames,
	makePri,
	parseFacility,
	parseSeverity,
	Severity,
	severityName,
	severityNames,
} from './pri.js';

export type {
	BomMode,
	Framing,
	Protocol,
	ResolvedBomMode,
	ResolvedFraming,
	ResolvedProtocol,
	ResolvedSettings,
	SettingsInput,
} from './protocol.js';
export {
	BOM_MODES,
	DEFAULT_PORT,
	FRAMINGS,
	needsFraming,
	PROTOCOLS,
	resolveBomMode,
	resolveFraming,
	resolveProtocol,
	resolveSettings,
} from './protocol.js';

export type { Target } from './targets.js';
export { parseTargetSpec, resolveTargets, splitHostPort } from './targets.js';
