/**
 * Shared formatting utilities for the CLI.
 */

// ============= Duration Formatting =============

type DurationStyle = "tiered" | "clock" | "decimal-hours";

/**
 * Format a duration to a human-readable string.
 *
 * @param ms - Duration in milliseconds
 * @param style - Output format style:
 *   - "tiered" (default): ms → s → m+s → h+m, for request timings
 *   - "clock": "H:MM" with minutes floored, e.g. "1:30" or "26:05"
 *   - "decimal-hours": hours rounded to two decimals, e.g. "1.5h"
 */
export function formatDuration(value: number, style: DurationStyle = "tiered"): string {
    // Negative spans (clock skew, end before start) render as zero
    const ms = Math.max(0, value);

    switch (style) {
        case "tiered": {
            if (ms < 1000) return `${Math.round(ms)}ms`;
            if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
            if (ms < 3600000) return `${Math.floor(ms / 60000)}m ${Math.floor((ms % 60000) / 1000)}s`;
            return `${Math.floor(ms / 3600000)}h ${Math.floor((ms % 3600000) / 60000)}m`;
        }

        case "clock": {
            const totalMinutes = Math.floor(ms / 60000);
            const hours = Math.floor(totalMinutes / 60);
            const minutes = totalMinutes % 60;
            return `${hours}:${String(minutes).padStart(2, "0")}`;
        }

        case "decimal-hours": {
            const hours = Math.round((ms / 3600000) * 100) / 100;
            return `${hours}h`;
        }

        default: {
            const _exhaustive: never = style;
            return `${_exhaustive}`;
        }
    }
}

// ============= Secrets =============

/**
 * Mask a secret for display, keeping only its last four characters.
 */
export function maskSecret(secret: string): string {
    if (secret.length <= 4) {
        return "*".repeat(secret.length);
    }
    return `${"*".repeat(Math.min(secret.length - 4, 8))}${secret.slice(-4)}`;
}
