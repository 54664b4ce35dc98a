/** Console-shaped sink; messages carry a bracketed component tag. */
export type Logger = Pick<Console, 'info' | 'warn' | 'error'>;

export const consoleLogger: Logger = console;
