// Debug output is off unless MACRO_INIT_DEBUG is set or a caller turns it on.
let forced: boolean | null = null;

export function setDebugLogging(enabled: boolean | null) {
	forced = enabled;
}

export function debugEnabled(): boolean {
	if (forced !== null) return forced;
	const v = process.env.MACRO_INIT_DEBUG;
	return !!v && v !== '0' && v.toLowerCase() !== 'false';
}

export function debug(scope: string, ...args: unknown[]) {
	if (debugEnabled()) console.error(`[macro-init:${scope}]`, ...args);
}
