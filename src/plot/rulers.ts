import { setOpacity } from '../helpers/colors';
import type { RectElement } from '../items/rect-element';
import { Orientation } from './point';
import { type Shape, type Stroke, lineSegment, textShape } from './shapes';
import type { ScreenTransform } from './transform';

/**
 * What the hover overlay needs to know about the plot being drawn.
 */
export interface PlotConfig {
	transform: ScreenTransform;
	/** Draw rulers and values along the x axis. */
	showX: boolean;
	/** Draw rulers and values along the y axis. */
	showY: boolean;
	textColor: string;
	font: string;
}

export const defaultPlotConfig: Omit<PlotConfig, 'transform'> = {
	showX: true,
	showY: true,
	textColor: '#d1d4dc',
	font: '12px sans-serif',
};

const LABEL_OFFSET = { x: 3, y: -2 };

/**
 * Draws crosshair rulers through an item's argument and value points, then the
 * hover label at its corner. Without `text`, the label is the item's name
 * followed by its default values format.
 */
export function addRulersAndText(
	elem: RectElement,
	plot: PlotConfig,
	text: string | undefined,
	shapes: Shape[]
): void {
	const orientation = elem.orientation();
	const vertical = orientation === Orientation.Vertical;
	const showArgument = vertical ? plot.showX : plot.showY;
	const showValues = vertical ? plot.showY : plot.showX;

	const { transform } = plot;
	const frame = transform.frame();
	const stroke: Stroke = { width: 1, color: setOpacity(plot.textColor, 0.5) };

	const verticalRuler = (x: number): Shape =>
		lineSegment([{ x, y: frame.min.y }, { x, y: frame.max.y }], stroke);
	const horizontalRuler = (y: number): Shape =>
		lineSegment([{ x: frame.min.x, y }, { x: frame.max.x, y }], stroke);

	if (showArgument) {
		for (const point of elem.argumentsWithRuler()) {
			const pos = transform.positionFromPoint(point);
			shapes.push(vertical ? verticalRuler(pos.x) : horizontalRuler(pos.y));
		}
	}

	if (showValues) {
		for (const point of elem.valuesWithRuler()) {
			const pos = transform.positionFromPoint(point);
			shapes.push(vertical ? horizontalRuler(pos.y) : verticalRuler(pos.x));
		}
	}

	const label =
		text ?? elem.name() + (showValues ? elem.defaultValuesFormat(transform) : '');

	const corner = transform.positionFromPoint(elem.cornerValue());
	shapes.push(
		textShape(
			{ x: corner.x + LABEL_OFFSET.x, y: corner.y + LABEL_OFFSET.y },
			label,
			plot.textColor,
			plot.font
		)
	);
}
