import glyphFont from './glyphs.json';
import { createValuePoint } from './points';
import type { Point, WaveformSpec, WaveformText } from './types';

type Vertex = readonly [number, number];

const FONT_ADVANCE = glyphFont.advance;
const GLYPHS: Record<string, Vertex[]> = Object.fromEntries(
  Object.entries(glyphFont.glyphs).map(([character, vertices]) => [
    character,
    vertices.map((vertex): Vertex => [vertex[0], vertex[1]])
  ])
);

/**
 * Polyline of the text laid out left to right. Characters without a glyph are drawn as spaces.
 */
export function vectorizeText(text: string): Vertex[] {
  const path: Vertex[] = [];
  let index = 0;
  for (const character of text.toUpperCase()) {
    const glyph = GLYPHS[character] ?? GLYPHS[' '] ?? [];
    const originX = index * FONT_ADVANCE;
    for (const [x, y] of glyph) {
      path.push([originX + x, y]);
    }
    index += 1;
  }
  return path;
}

function samplesPerPeriod(spec: WaveformSpec, textPath: Vertex[] | null): number {
  return textPath ? textPath.length : spec.samplesPerPeriod;
}

export function waveformLength(spec: WaveformSpec): number {
  const textPath = spec.shape === 'text' && spec.text ? vectorizeText(spec.text.content) : null;
  return computeLength(spec, samplesPerPeriod(spec, textPath));
}

function computeLength(spec: WaveformSpec, periodSamples: number): number {
  if (spec.intervalMs <= 0) {
    return 0;
  }
  if (spec.numberOfPoints > 0) {
    return Math.trunc(spec.numberOfPoints);
  }
  return Math.max(0, Math.trunc(spec.numberOfPeriods * periodSamples));
}

function periodicValue(shape: WaveformSpec['shape'], angle: number, index: number): number {
  switch (shape) {
    case 'sine':
      return Math.sin(angle);
    case 'square': {
      const fraction = positiveFraction(angle / (2 * Math.PI));
      return fraction < 0.5 ? 1 : -1;
    }
    case 'sawtooth':
      return 2 * positiveFraction(angle / (2 * Math.PI)) - 1;
    case 'linear':
      return index;
    case 'text':
      return 0;
  }
}

function positiveFraction(value: number): number {
  return value - Math.floor(value);
}

function textChannel(path: Vertex[], index: number, text: WaveformText): number {
  const vertex = path[((index % path.length) + path.length) % path.length];
  if (!vertex) {
    return 0;
  }
  return text.channel === 'x' ? vertex[0] : vertex[1];
}

/**
 * Deterministic synthetic points. Each iteration restarts from the first sample.
 */
export function generateWaveform(spec: WaveformSpec): Iterable<Point> {
  return {
    *[Symbol.iterator](): Iterator<Point> {
      const textPath = spec.shape === 'text' && spec.text ? vectorizeText(spec.text.content) : null;
      const periodSamples = samplesPerPeriod(spec, textPath);
      if (periodSamples <= 0) {
        return;
      }
      const count = computeLength(spec, periodSamples);
      const textShift = Math.round(spec.phase * periodSamples);

      for (let index = 0; index < count; index += 1) {
        const angle = 2 * Math.PI * (index / periodSamples + spec.phase);
        const raw =
          textPath && spec.text
            ? textChannel(textPath, index + textShift, spec.text)
            : periodicValue(spec.shape, angle, index);

        yield createValuePoint(spec.startTime + index * spec.intervalMs, spec.offset + spec.scalar * raw, {
          gradeCode: spec.gradeCode,
          qualifiers: spec.qualifiers
        });
      }
    }
  };
}
