/**
 * Hour of day as a 12-hour label
 * 0 -> "12 AM", 9 -> "9 AM", 12 -> "12 PM", 15 -> "3 PM"
 */
export function formatHour(hour: number): string {
    if (hour === 0) return "12 AM";
    if (hour < 12) return `${hour} AM`;
    if (hour === 12) return "12 PM";
    return `${hour - 12} PM`;
}

/**
 * One decimal, e.g. 4.333 -> "4.3"
 */
export function formatOneDecimal(value: number): string {
    if (!Number.isFinite(value)) return "--";
    return value.toFixed(1);
}

// 1234 -> "1,234"
export function formatCount(value: number): string {
    return value.toLocaleString("en-US");
}
