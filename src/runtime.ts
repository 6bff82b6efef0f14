/**
 * Side-effecting process hooks, injectable so commands can be exercised
 * without printing or exiting.
 */
export type RuntimeEnv = {
	log: (message: string) => void;
	error: (message: string) => void;
	exit: (code: number) => never;
};

export const defaultRuntime: RuntimeEnv = {
	log: (message) => console.log(message),
	error: (message) => console.error(message),
	exit: (code) => process.exit(code),
};
