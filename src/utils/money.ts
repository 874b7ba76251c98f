// Round to 2 decimal places for currency math.
export const roundMoney = (amount: number): number => Math.round(amount * 100) / 100;

// Fixed two-decimal rendering used in message templates.
export const formatMoney = (amount: number): string => roundMoney(amount).toFixed(2);

// One-decimal percentage rendering used in message templates.
export const formatPct = (value: number): string => (Math.round(value * 10) / 10).toFixed(1);
