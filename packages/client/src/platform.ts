/**
 * Local-socket capability of the host platform.
 *
 * The target resolver asks this object whether Unix domain sockets exist
 * here and where a system SYSLOG daemon usually listens.
 */

export interface PlatformCapability {
	readonly supportsLocalSockets: boolean;
	/** Standard daemon socket paths, most likely first */
	readonly localSocketPaths: readonly string[];
}

export const unixPlatform: PlatformCapability = {
	supportsLocalSockets: true,
	localSocketPaths: ['/dev/log', '/var/run/syslog', '/var/run/log'],
};

export const noLocalSockets: PlatformCapability = {
	supportsLocalSockets: false,
	localSocketPaths: [],
};

export function detectPlatform(platform: NodeJS.Platform = process.platform): PlatformCapability {
	return platform === 'win32' ? noLocalSockets : unixPlatform;
}
