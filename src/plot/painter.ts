import { rectHeight, rectWidth } from './point';
import type { LineSegmentShape, RectShape, Shape, Stroke, TextShape } from './shapes';

/**
 * The part of `CanvasRenderingContext2D` the painter uses.
 */
export interface PaintContext {
	fillStyle: CanvasRenderingContext2D['fillStyle'];
	strokeStyle: CanvasRenderingContext2D['strokeStyle'];
	lineWidth: number;
	font: string;
	textAlign: CanvasTextAlign;
	textBaseline: CanvasTextBaseline;
	save(): void;
	restore(): void;
	beginPath(): void;
	rect(x: number, y: number, w: number, h: number): void;
	roundRect?: (x: number, y: number, w: number, h: number, radii?: number) => void;
	moveTo(x: number, y: number): void;
	lineTo(x: number, y: number): void;
	fill(): void;
	stroke(): void;
	fillText(text: string, x: number, y: number): void;
}

const DEFAULT_LINE_HEIGHT = 14;

function lineHeightOf(font: string): number {
	const size = font.match(/(\d+(?:\.\d+)?)px/);
	return size ? parseFloat(size[1]) * 1.2 : DEFAULT_LINE_HEIGHT;
}

function applyStroke(ctx: PaintContext, stroke: Stroke): boolean {
	if (stroke.width <= 0) {
		return false;
	}
	ctx.strokeStyle = stroke.color;
	ctx.lineWidth = stroke.width;
	return true;
}

function paintRect(ctx: PaintContext, shape: RectShape): void {
	const { rect, rounding } = shape;
	ctx.beginPath();
	if (rounding > 0 && ctx.roundRect) {
		ctx.roundRect(rect.min.x, rect.min.y, rectWidth(rect), rectHeight(rect), rounding);
	} else {
		ctx.rect(rect.min.x, rect.min.y, rectWidth(rect), rectHeight(rect));
	}
	ctx.fillStyle = shape.fill;
	ctx.fill();
	if (applyStroke(ctx, shape.stroke)) {
		ctx.stroke();
	}
}

function paintLineSegment(ctx: PaintContext, shape: LineSegmentShape): void {
	if (!applyStroke(ctx, shape.stroke)) {
		return;
	}
	const [from, to] = shape.points;
	ctx.beginPath();
	ctx.moveTo(from.x, from.y);
	ctx.lineTo(to.x, to.y);
	ctx.stroke();
}

// Canvas text has no line breaks: lines are stacked upwards from the anchor
function paintText(ctx: PaintContext, shape: TextShape): void {
	const lines = shape.text.split('\n');
	const lineHeight = lineHeightOf(shape.font);
	ctx.font = shape.font;
	ctx.fillStyle = shape.color;
	ctx.textAlign = 'left';
	ctx.textBaseline = 'bottom';
	lines.forEach((line, i) => {
		const y = shape.pos.y - (lines.length - 1 - i) * lineHeight;
		ctx.fillText(line, shape.pos.x, y);
	});
}

/**
 * Draws shapes in list order.
 */
export function paintShapes(ctx: PaintContext, shapes: readonly Shape[]): void {
	ctx.save();
	for (const shape of shapes) {
		switch (shape.kind) {
			case 'rect':
				paintRect(ctx, shape);
				break;
			case 'lineSegment':
				paintLineSegment(ctx, shape);
				break;
			case 'text':
				paintText(ctx, shape);
				break;
			default: {
				const unknown: never = shape;
				throw new Error(`Unknown shape: ${JSON.stringify(unknown)}`);
			}
		}
	}
	ctx.restore();
}
