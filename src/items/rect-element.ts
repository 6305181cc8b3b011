import { Orientation, type PlotBounds, type PlotPoint, boundsCenter } from '../plot/point';
import type { ScreenTransform } from '../plot/transform';

/**
 * Capabilities shared by every rectangular chart item (candles, bars), so
 * bounds fitting, hit testing and the hover rulers can treat them alike.
 */
export interface RectElement {
	/** Label shown above the default values; may be empty. */
	name(): string;
	boundsMin(): PlotPoint;
	boundsMax(): PlotPoint;
	/** Points that get a value ruler (horizontal for vertical items). */
	valuesWithRuler(): PlotPoint[];
	/** Points that get an argument ruler (vertical for vertical items). */
	argumentsWithRuler(): PlotPoint[];
	orientation(): Orientation;
	/** Where the hover label is anchored. */
	cornerValue(): PlotPoint;
	defaultValuesFormat(transform: ScreenTransform): string;
}

export function elementBounds(elem: RectElement): PlotBounds {
	return { min: elem.boundsMin(), max: elem.boundsMax() };
}

// One argument ruler through the middle of the item
export function defaultArgumentsWithRuler(elem: RectElement): PlotPoint[] {
	return [boundsCenter(elementBounds(elem))];
}
