import type { PlotConfig } from '../plot/rulers';
import type { Shape, Stroke } from '../plot/shapes';
import type { ScreenTransform } from '../plot/transform';
import { Bar } from './bar-elem';
import { CandleElem } from './candle-elem';

/**
 * Every item kind a chart plot can hold.
 */
export type ChartElement = CandleElem | Bar;

function unknownElement(elem: never): never {
	throw new Error(`Unknown chart element: ${JSON.stringify(elem)}`);
}

export function elementShapes(
	elem: ChartElement,
	transform: ScreenTransform,
	highlighted: boolean,
	shapes: Shape[]
): void {
	switch (elem.kind) {
		case 'candle':
			elem.addShapes(transform, highlighted, shapes);
			break;
		case 'bar':
			elem.addShapes(transform, highlighted, shapes);
			break;
		default:
			unknownElement(elem);
	}
}

export function elementRulersAndText(
	elem: ChartElement,
	plot: PlotConfig,
	shapes: Shape[],
	format?: (elem: ChartElement) => string
): void {
	switch (elem.kind) {
		case 'candle':
			elem.addRulersAndText(plot, shapes, format);
			break;
		case 'bar':
			elem.addRulersAndText(plot, shapes, format);
			break;
		default:
			unknownElement(elem);
	}
}

export function withElementStyle(elem: ChartElement, stroke: Stroke, fill: string): ChartElement {
	switch (elem.kind) {
		case 'candle':
			return elem.withStroke(stroke).withFill(fill);
		case 'bar':
			return elem.withStroke(stroke).withFill(fill);
		default:
			return unknownElement(elem);
	}
}
