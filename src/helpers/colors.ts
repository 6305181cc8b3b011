import type { Stroke } from '../plot/shapes';

export interface Rgba {
    r: number;
    g: number;
    b: number;
    /** 0..1 */
    a: number;
}

const HEX_REGEX = /^#([0-9a-f]{3}|[0-9a-f]{6}|[0-9a-f]{8})$/i;
const RGB_REGEX = /^rgba?\(\s*([\d.]+)\s*,\s*([\d.]+)\s*,\s*([\d.]+)\s*(?:,\s*([\d.]+)\s*)?\)$/i;

function parseHex(hex: string): Rgba {
    const digits = hex.replace(/^#/, '');
    if (digits.length === 3) {
        return {
            r: parseInt(digits[0] + digits[0], 16),
            g: parseInt(digits[1] + digits[1], 16),
            b: parseInt(digits[2] + digits[2], 16),
            a: 1,
        };
    }
    return {
        r: parseInt(digits.slice(0, 2), 16),
        g: parseInt(digits.slice(2, 4), 16),
        b: parseInt(digits.slice(4, 6), 16),
        a: digits.length === 8 ? parseInt(digits.slice(6, 8), 16) / 255 : 1,
    };
}

function clamp(value: number, max: number): number {
    return Math.min(Math.max(value, 0), max);
}

// Reads hex, rgb(), rgba() and 'transparent'; undefined for anything else
export function readColor(color: string): Rgba | undefined {
    const trimmed = color.trim();
    if (trimmed.toLowerCase() === 'transparent') {
        return { r: 0, g: 0, b: 0, a: 0 };
    }
    if (HEX_REGEX.test(trimmed)) {
        return parseHex(trimmed);
    }
    const match = trimmed.match(RGB_REGEX);
    if (!match) {
        return undefined;
    }
    // Out of range channels are clamped as CSS does
    return {
        r: clamp(parseFloat(match[1]), 255),
        g: clamp(parseFloat(match[2]), 255),
        b: clamp(parseFloat(match[3]), 255),
        a: match[4] !== undefined ? clamp(parseFloat(match[4]), 1) : 1,
    };
}

export function parseColor(color: string): Rgba {
    const rgba = readColor(color);
    if (rgba === undefined) {
        throw new Error(`Unsupported color format "${color}". Use hex, rgb, or rgba.`);
    }
    return rgba;
}

export function toRgbaString({ r, g, b, a }: Rgba): string {
    return `rgba(${r}, ${g}, ${b}, ${a})`;
}

// Converts a hex color to RGBA with specified opacity
export function hexToRGBA(hex: string, opacity: number): string {
    if (!HEX_REGEX.test(hex)) {
        throw new Error("Invalid hex color format.");
    }
    return toRgbaString({ ...parseHex(hex), a: opacity });
}

// Replaces the opacity of a color (hex, rgb, or rgba). Other CSS colors
// such as named ones are returned unchanged.
export function setOpacity(color: string, newOpacity: number): string {
    const trimmed = color.trim();
    if (HEX_REGEX.test(trimmed)) {
        return hexToRGBA(trimmed, newOpacity);
    }
    const rgba = readColor(trimmed);
    return rgba === undefined ? color : toRgbaString({ ...rgba, a: newOpacity });
}

/**
 * Emphasized variant of a stroke/fill pair, used for the hovered item:
 * twice the stroke width and twice the fill opacity (capped at opaque).
 * A fill that `readColor` cannot read keeps its color.
 */
export function highlightedColor(stroke: Stroke, fill: string): [Stroke, string] {
    const highlightedStroke = { ...stroke, width: stroke.width * 2 };
    const rgba = readColor(fill);
    if (rgba === undefined) {
        return [highlightedStroke, fill];
    }
    return [highlightedStroke, toRgbaString({ ...rgba, a: Math.min(2 * rgba.a, 1) })];
}
