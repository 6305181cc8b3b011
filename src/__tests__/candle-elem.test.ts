import { describe, expect, it } from 'vitest';
import { Candle, CandleElem } from '../items/candle-elem';
import { Orientation } from '../plot/point';
import type { PlotConfig } from '../plot/rulers';
import { type LineSegmentShape, type RectShape, type Shape, TRANSPARENT, type TextShape } from '../plot/shapes';
import { LinearScreenTransform } from '../plot/transform';

// x: 0..10 -> 0..200, y: 0..20 -> 100..0
const transform = new LinearScreenTransform(
	{ min: { x: 0, y: 0 }, max: { x: 200, y: 100 } },
	{ min: { x: 0, y: 0 }, max: { x: 10, y: 20 } }
);

const bullish = new Candle(10, 12, 9, 11, 500);
const bearish = new Candle(11, 12, 9, 10, 500);

function asRect(shape: Shape): RectShape {
	if (shape.kind !== 'rect') {
		throw new Error(`expected a rect, got ${shape.kind}`);
	}
	return shape;
}

function asSegment(shape: Shape): LineSegmentShape {
	if (shape.kind !== 'lineSegment') {
		throw new Error(`expected a line segment, got ${shape.kind}`);
	}
	return shape;
}

function asText(shape: Shape): TextShape {
	if (shape.kind !== 'text') {
		throw new Error(`expected text, got ${shape.kind}`);
	}
	return shape;
}

describe('Candle', () => {
	it('stores the five values in order', () => {
		const candle = new Candle(1, 2, 3, 4, 5);
		expect([candle.open, candle.high, candle.low, candle.close, candle.volume]).toEqual([1, 2, 3, 4, 5]);
	});

	it('accepts NaN and unordered values', () => {
		const candle = new Candle(NaN, 1, 5, 2, -3);
		expect(candle.open).toBeNaN();
		expect(candle.low).toBe(5);
	});
});

describe('CandleElem construction', () => {
	it('starts at x = 0 with default widths and transparent style', () => {
		const elem = new CandleElem(bullish);
		expect(elem.kind).toBe('candle');
		expect(elem.x).toBe(0);
		expect(elem.candleWidth).toBe(0.25);
		expect(elem.whiskerWidth).toBe(0.15);
		expect(elem.stroke).toEqual({ width: 1, color: TRANSPARENT });
		expect(elem.fill).toBe(TRANSPARENT);
	});

	it('returns a new element from each builder call', () => {
		const base = new CandleElem(bullish);
		const styled = base
			.withStroke({ width: 2, color: '#008000' })
			.withFill('#00ff00')
			.withCandleWidth(0.5)
			.withWhiskerWidth(0.1)
			.withX(4);

		expect(styled.stroke).toEqual({ width: 2, color: '#008000' });
		expect(styled.fill).toBe('#00ff00');
		expect(styled.candleWidth).toBe(0.5);
		expect(styled.whiskerWidth).toBe(0.1);
		expect(styled.x).toBe(4);
		expect(styled.candle).toBe(bullish);

		expect(base.candleWidth).toBe(0.25);
		expect(base.x).toBe(0);
	});

	it('replaces exactly one field per builder call', () => {
		const base = new CandleElem(bullish, { x: 2, fill: '#123456' });
		expect(base.withCandleWidth(1).options()).toEqual({ ...base.options(), candleWidth: 1 });
	});

	it('accepts zero and negative widths', () => {
		const elem = new CandleElem(bullish).withCandleWidth(-1).withWhiskerWidth(0);
		expect(elem.candleWidth).toBe(-1);
		expect(elem.whiskerWidth).toBe(0);
	});
});

describe('CandleElem bounds and rulers', () => {
	const elem = new CandleElem(bullish).withX(3).withCandleWidth(0.4);

	it('spans the wider of body and whisker on x and low..high on y', () => {
		const min = elem.boundsMin();
		const max = elem.boundsMax();
		expect(min.x).toBeCloseTo(2.8);
		expect(min.y).toBe(9);
		expect(max.x).toBeCloseTo(3.2);
		expect(max.y).toBe(12);
		expect(max.x - min.x).toBeCloseTo(0.4);
	});

	it('uses the whisker width when it is wider than the body', () => {
		const wide = elem.withWhiskerWidth(1);
		expect(wide.boundsMin().x).toBeCloseTo(2.5);
		expect(wide.boundsMax().x).toBeCloseTo(3.5);
	});

	it('puts rulers at open, high, low, close and volume', () => {
		expect(elem.valuesWithRuler()).toEqual([
			{ x: 3, y: 10 },
			{ x: 3, y: 12 },
			{ x: 3, y: 9 },
			{ x: 3, y: 11 },
			{ x: 3, y: 500 },
		]);
	});

	it('is vertical, unnamed and anchored at the high', () => {
		expect(elem.orientation()).toBe(Orientation.Vertical);
		expect(elem.name()).toBe('');
		expect(elem.cornerValue()).toEqual({ x: 3, y: 12 });
	});

	it('puts the argument ruler through the middle of the bounds', () => {
		const [center] = elem.argumentsWithRuler();
		expect(center.x).toBeCloseTo(3);
		expect(center.y).toBe(10.5);
	});
});

describe('CandleElem.defaultValuesFormat', () => {
	it('uses two decimals at 0.05 value units per pixel', () => {
		const zoomed = new LinearScreenTransform(
			{ min: { x: 0, y: 0 }, max: { x: 100, y: 100 } },
			{ min: { x: 0, y: 0 }, max: { x: 10, y: 5 } }
		);
		expect(new CandleElem(bullish).defaultValuesFormat(zoomed)).toBe(
			'\nOpen = 10.00\nHigh = 12.00\nLow = 9.00\nClose = 11.00\nVolume = 500.00'
		);
	});

	it('drops decimals when zoomed out', () => {
		const zoomedOut = new LinearScreenTransform(
			{ min: { x: 0, y: 0 }, max: { x: 100, y: 100 } },
			{ min: { x: 0, y: 0 }, max: { x: 10, y: 500 } }
		);
		expect(new CandleElem(bullish).defaultValuesFormat(zoomedOut)).toBe(
			'\nOpen = 10\nHigh = 12\nLow = 9\nClose = 11\nVolume = 500'
		);
	});
});

describe('CandleElem.addShapes', () => {
	const style = { stroke: { width: 1, color: '#008000' }, fill: 'rgba(0, 128, 0, 0.25)' };

	it('appends a body rect and a whisker', () => {
		const elem = new CandleElem(bullish, { x: 3, candleWidth: 0.4, ...style });
		const shapes: Shape[] = [];
		elem.addShapes(transform, false, shapes);

		expect(shapes).toHaveLength(2);
		const body = asRect(shapes[0]);
		expect(body.rounding).toBe(0);
		expect(body.fill).toBe('rgba(0, 128, 0, 0.25)');
		expect(body.stroke).toEqual({ width: 1, color: '#008000' });
		expect(body.rect.min.x).toBeCloseTo(56);
		expect(body.rect.min.y).toBeCloseTo(45);
		expect(body.rect.max.x).toBeCloseTo(64);
		expect(body.rect.max.y).toBeCloseTo(50);

		const whisker = asSegment(shapes[1]);
		expect(whisker.stroke).toEqual({ width: 1, color: '#008000' });
		const [low, high] = whisker.points;
		expect(low.x).toBeCloseTo(60);
		expect(low.y).toBeCloseTo(55);
		expect(high.x).toBeCloseTo(60);
		expect(high.y).toBeCloseTo(40);
	});

	it('appends to existing shapes', () => {
		const shapes: Shape[] = [];
		new CandleElem(bullish).addShapes(transform, false, shapes);
		new CandleElem(bearish).addShapes(transform, true, shapes);
		expect(shapes.map((shape) => shape.kind)).toEqual(['rect', 'lineSegment', 'rect', 'lineSegment']);
	});

	it('draws the same body for a bearish candle', () => {
		const up: Shape[] = [];
		const down: Shape[] = [];
		new CandleElem(bullish, { x: 3, candleWidth: 0.4 }).addShapes(transform, false, up);
		new CandleElem(bearish, { x: 3, candleWidth: 0.4 }).addShapes(transform, false, down);

		const a = asRect(up[0]).rect;
		const b = asRect(down[0]).rect;
		expect(b.min.x).toBeCloseTo(a.min.x);
		expect(b.min.y).toBeCloseTo(a.min.y);
		expect(b.max.x).toBeCloseTo(a.max.x);
		expect(b.max.y).toBeCloseTo(a.max.y);
		expect(down).toHaveLength(2);
	});

	it('highlights without touching the element', () => {
		const elem = new CandleElem(bullish, style);
		const highlighted: Shape[] = [];
		const plain: Shape[] = [];
		elem.addShapes(transform, true, highlighted);
		elem.addShapes(transform, false, plain);

		expect(asRect(highlighted[0]).stroke).toEqual({ width: 2, color: '#008000' });
		expect(asRect(highlighted[0]).fill).toBe('rgba(0, 128, 0, 0.5)');
		expect(asSegment(highlighted[1]).stroke).toEqual({ width: 2, color: '#008000' });

		expect(asRect(plain[0]).stroke).toEqual({ width: 1, color: '#008000' });
		expect(asRect(plain[0]).fill).toBe('rgba(0, 128, 0, 0.25)');
		expect(elem.stroke).toEqual({ width: 1, color: '#008000' });
		expect(elem.fill).toBe('rgba(0, 128, 0, 0.25)');
	});
});

describe('CandleElem.addShapes with named colors', () => {
	it('highlights a named fill by widening the stroke only', () => {
		const elem = new CandleElem(bullish).withFill('green').withStroke({ width: 1, color: 'darkgreen' });
		const shapes: Shape[] = [];
		elem.addShapes(transform, true, shapes);

		expect(shapes).toHaveLength(2);
		expect(asRect(shapes[0]).fill).toBe('green');
		expect(asRect(shapes[0]).stroke).toEqual({ width: 2, color: 'darkgreen' });
		expect(asSegment(shapes[1]).stroke).toEqual({ width: 2, color: 'darkgreen' });
	});
});

describe('CandleElem.addRulersAndText', () => {
	const elem = new CandleElem(bullish).withX(3).withCandleWidth(0.4);
	const plot: PlotConfig = {
		transform,
		showX: true,
		showY: true,
		textColor: '#ffffff',
		font: '12px sans-serif',
	};

	it('draws one argument ruler, five value rulers and the default label', () => {
		const shapes: Shape[] = [];
		elem.addRulersAndText(plot, shapes);

		expect(shapes).toHaveLength(7);
		const rulerStroke = { width: 1, color: 'rgba(255, 255, 255, 0.5)' };

		const argument = asSegment(shapes[0]);
		expect(argument.stroke).toEqual(rulerStroke);
		expect(argument.points[0].x).toBeCloseTo(60);
		expect(argument.points[0].y).toBe(0);
		expect(argument.points[1].x).toBeCloseTo(60);
		expect(argument.points[1].y).toBe(100);

		const valueYs = shapes.slice(1, 6).map((shape) => asSegment(shape).points[0].y);
		[50, 40, 55, 45, -2400].forEach((y, i) => expect(valueYs[i]).toBeCloseTo(y));
		for (const shape of shapes.slice(1, 6)) {
			const [from, to] = asSegment(shape).points;
			expect(from.x).toBe(0);
			expect(to.x).toBe(200);
		}

		const label = asText(shapes[6]);
		expect(label.text).toBe('\nOpen = 10.0\nHigh = 12.0\nLow = 9.0\nClose = 11.0\nVolume = 500.0');
		expect(label.anchor).toBe('leftBottom');
		expect(label.color).toBe('#ffffff');
		expect(label.font).toBe('12px sans-serif');
		expect(label.pos.x).toBeCloseTo(63);
		expect(label.pos.y).toBeCloseTo(38);
	});

	it('uses the formatter text when one is given', () => {
		const shapes: Shape[] = [];
		elem.addRulersAndText(plot, shapes, (candle) => `close ${candle.candle.close}`);
		expect(asText(shapes[shapes.length - 1]).text).toBe('close 11');
	});

	it('skips value rulers and values when the y axis is hidden', () => {
		const shapes: Shape[] = [];
		elem.addRulersAndText({ ...plot, showY: false }, shapes);
		expect(shapes.map((shape) => shape.kind)).toEqual(['lineSegment', 'text']);
		expect(asText(shapes[1]).text).toBe('');
	});
});
