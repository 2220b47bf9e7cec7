export const DEFAULT_DECIMALS = 2;

export const fixed = (n: number, decimals = DEFAULT_DECIMALS): string => n.toFixed(decimals);

/** Renders a 0..1 rate as a percentage number, without the % sign. */
export const percent = (rate: number, decimals = DEFAULT_DECIMALS): string => (rate * 100).toFixed(decimals);
