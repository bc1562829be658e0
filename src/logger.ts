/** Subset of the console used for diagnostics output; `console` itself fits. */
export type Logger = Pick<Console, 'debug' | 'warn' | 'error'>;

export const silentLogger: Logger = {
	debug: () => undefined,
	warn: () => undefined,
	error: () => undefined
};
