import { describe, it, expect } from 'vitest';
import {
  FederatedAverageAggregator,
  decodeFloat32,
  encodeFloat32
} from '../src/core/GradientAggregator';
import { InvalidGradientError } from '../src/utils/errors';

describe('FederatedAverageAggregator', () => {
  const aggregator = new FederatedAverageAggregator();

  it('should step the weights against the mean gradient', async () => {
    const next = await aggregator.aggregate({
      weights: encodeFloat32([1, 2, 3]),
      gradients: [encodeFloat32([0.5, 1, 1.5]), encodeFloat32([1.5, 1, 0.5])],
      learningRate: 0.5
    });

    expect(decodeFloat32(next)).toEqual([0.5, 1.5, 2.5]);
  });

  it('should read vectors that start at an offset into their buffer', async () => {
    const padded = new Uint8Array(12);
    padded.set(encodeFloat32([2, 4]), 4);

    const next = await aggregator.aggregate({
      weights: padded.subarray(4),
      gradients: [encodeFloat32([2, 2])],
      learningRate: 1
    });

    expect(decodeFloat32(next)).toEqual([0, 2]);
  });

  it('should reject an empty gradient list', async () => {
    await expect(
      aggregator.aggregate({ weights: encodeFloat32([1]), gradients: [], learningRate: 1 })
    ).rejects.toThrow(InvalidGradientError);
  });

  it('should reject a gradient of the wrong length', async () => {
    await expect(
      aggregator.aggregate({
        weights: encodeFloat32([1, 2]),
        gradients: [encodeFloat32([1, 2, 3])],
        learningRate: 1
      })
    ).rejects.toThrow('gradient #1 has 3 values, weights have 2');
  });

  it('should reject bytes that are not float32 aligned', async () => {
    await expect(
      aggregator.aggregate({
        weights: encodeFloat32([1]),
        gradients: [new Uint8Array([1, 2, 3])],
        learningRate: 1
      })
    ).rejects.toThrow(InvalidGradientError);
  });
});
