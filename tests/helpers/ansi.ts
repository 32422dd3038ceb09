export const stripAnsi = (value: string | undefined): string =>
	value?.replace(/\x1B\[[0-9;]*m/g, "") ?? "";

export const tick = (): Promise<void> => new Promise((resolve) => setTimeout(resolve, 0));
