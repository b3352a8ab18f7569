// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

/** Thickness used for layers whose quantity text cannot be read. */
export const DEFAULT_LAYER_THICKNESS = 0.01;

const DECIMAL_REGEX = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

const UNIT_DIVISORS: Record<string, number> = {
    mm: 1000,
    cm: 100,
    m: 1,
};

/**
 * Parses a plain decimal token ("180", "0.5", "1e-3"). Returns undefined for
 * anything else, including trailing garbage, which `Number.parseFloat` would accept.
 */
export function parseDecimal(text: string | undefined): number | undefined {
    if (text === undefined) return undefined;
    const trimmed = text.trim();
    if (!DECIMAL_REGEX.test(trimmed)) return undefined;
    return Number(trimmed);
}

export function parseInteger(text: string | undefined): number | undefined {
    const value = parseDecimal(text);
    return value !== undefined && Number.isInteger(value) ? value : undefined;
}

export function parseFlag(text: string | undefined): boolean | undefined {
    if (text === undefined) return undefined;
    switch (text.trim().toLowerCase()) {
        case "true":
        case "1":
            return true;
        case "false":
        case "0":
            return false;
        default:
            return undefined;
    }
}

export function millimetresToMetres(value: number): number {
    return value / 1000;
}

/**
 * Reads a quantity such as "200,00 mm" or "5 cm" as metres. The number may use
 * a decimal comma; the unit defaults to millimetres when missing or unknown.
 * Anything unreadable yields {@link DEFAULT_LAYER_THICKNESS}.
 */
export function parseThickness(quantityText: string | undefined): number {
    if (!quantityText) return DEFAULT_LAYER_THICKNESS;

    const parts = quantityText.trim().split(/\s+/);
    const value = parseDecimal(parts[0]?.replace(",", "."));
    if (value === undefined || value < 0) return DEFAULT_LAYER_THICKNESS;

    const unit = (parts[1] ?? "mm").toLowerCase();
    return value / (UNIT_DIVISORS[unit] ?? UNIT_DIVISORS.mm);
}
