import { describe, it } from 'node:test';
import assert from 'node:assert';
import { PNG } from 'pngjs';
import { COLORS, renderCandlestickPng, whiteSquarePng } from '../src/chart/pngChart.js';

function pixel(png: PNG, x: number, y: number) {
  const i = (png.width * y + x) << 2;
  return [png.data[i], png.data[i + 1], png.data[i + 2]];
}

describe('renderCandlestickPng', () => {
  it('produces a PNG of the requested size on the dark background', () => {
    const png = PNG.sync.read(renderCandlestickPng([], { width: 240, height: 100 }));
    assert.strictEqual(png.width, 240);
    assert.strictEqual(png.height, 100);
    assert.deepStrictEqual(pixel(png, 0, 0), [...COLORS.background]);
    assert.deepStrictEqual(pixel(png, 120, 50), [...COLORS.background]);
  });

  it('clamps tiny sizes', () => {
    const png = PNG.sync.read(renderCandlestickPng([], { width: 3, height: 2 }));
    assert.strictEqual(png.width, 40);
    assert.strictEqual(png.height, 40);
  });

  it('paints rising and falling candles in their colours', () => {
    const up = PNG.sync.read(renderCandlestickPng(
      [{ date: '2024-03-01', open: 10, high: 13, low: 9, close: 12, volume: 100 }],
      { width: 100, height: 100 }
    ));
    assert.deepStrictEqual(pixel(up, 30, 40), [...COLORS.up]);

    const down = PNG.sync.read(renderCandlestickPng(
      [{ date: '2024-03-01', open: 12, high: 13, low: 9, close: 10, volume: 100 }],
      { width: 100, height: 100 }
    ));
    assert.deepStrictEqual(pixel(down, 30, 40), [...COLORS.down]);
    // full-height volume bar at the bottom of the volume panel
    assert.deepStrictEqual(pixel(down, 30, 91), [...COLORS.down]);
  });
});

describe('whiteSquarePng', () => {
  it('is a white square', () => {
    const png = PNG.sync.read(whiteSquarePng(100));
    assert.strictEqual(png.width, 100);
    assert.strictEqual(png.height, 100);
    assert.deepStrictEqual(pixel(png, 0, 0), [255, 255, 255]);
    assert.deepStrictEqual(pixel(png, 99, 99), [255, 255, 255]);
  });
});
