/**
 * @module channel-blend
 * Per-layout blending of the two endpoint colors.
 *
 * The angle gradient sampler has one control flow for every layout; a
 * {@link ChannelBlend} is the only part that knows how many channels a pixel
 * has and where their values come from.
 *
 * @packageDocumentation
 */

import type { ChannelLayout, Color } from '@conic-fill/types';

/** Blends start and end colors at fraction t, one channel at a time. */
export interface ChannelBlend {
  readonly layout: ChannelLayout;
  /** Channels written per pixel. */
  readonly channels: number;
  /**
   * Untruncated `start(c) + t * (end(c) - start(c))`.
   *
   * @param channel - Channel index in output order.
   */
  channelAt(channel: number, t: number): number;
}

class LinearChannelBlend implements ChannelBlend {
  readonly channels: number;
  private readonly starts: Float64Array;
  private readonly deltas: Float64Array;

  constructor(
    readonly layout: ChannelLayout,
    starts: readonly number[],
    ends: readonly number[],
  ) {
    this.channels = starts.length;
    this.starts = Float64Array.from(starts);
    this.deltas = Float64Array.from(starts, (s, i) => ends[i] - s);
  }

  channelAt(channel: number, t: number): number {
    return this.starts[channel] + t * this.deltas[channel];
  }
}

/** Four channels in R, G, B, A output order. */
export function createRgbaBlend(start: Color, end: Color): ChannelBlend {
  return new LinearChannelBlend(
    'rgba',
    [start.r, start.g, start.b, start.a],
    [end.r, end.g, end.b, end.a],
  );
}

/** One gray channel, taken from each color's red channel. */
export function createGrayBlend(start: Color, end: Color): ChannelBlend {
  return new LinearChannelBlend('gray', [start.r], [end.r]);
}

export function createChannelBlend(layout: ChannelLayout, start: Color, end: Color): ChannelBlend {
  return layout === 'gray' ? createGrayBlend(start, end) : createRgbaBlend(start, end);
}

/** Single-channel targets take the gray path, everything else RGBA. */
export function layoutForChannelCount(channels: number): ChannelLayout {
  return channels === 1 ? 'gray' : 'rgba';
}

export function channelCountForLayout(layout: ChannelLayout): 1 | 4 {
  return layout === 'gray' ? 1 : 4;
}
