import { InvalidGradientError } from '../utils/errors';

export interface AggregationInput {
  weights: Uint8Array;
  gradients: Uint8Array[];
  learningRate: number;
}

/**
 * Folds gradient blobs into new weights. The coordinator treats both sides
 * as opaque bytes; the numerical rule lives entirely behind this interface.
 */
export interface GradientAggregator {
  readonly name: string;
  aggregate(input: AggregationInput): Promise<Uint8Array>;
}

function toFloat32(bytes: Uint8Array, label: string): Float32Array {
  if (bytes.byteLength % 4 !== 0) {
    throw new InvalidGradientError(`${label} is not a float32 vector (${bytes.byteLength} bytes)`);
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const values = new Float32Array(bytes.byteLength / 4);
  for (let i = 0; i < values.length; i++) {
    values[i] = view.getFloat32(i * 4, true);
  }
  return values;
}

export function encodeFloat32(values: ArrayLike<number>): Uint8Array {
  const bytes = new Uint8Array(values.length * 4);
  const view = new DataView(bytes.buffer);
  for (let i = 0; i < values.length; i++) {
    view.setFloat32(i * 4, values[i], true);
  }
  return bytes;
}

export function decodeFloat32(bytes: Uint8Array): number[] {
  return Array.from(toFloat32(bytes, 'blob'));
}

/**
 * Federated averaging over little-endian float32 vectors:
 * `weights - learningRate * mean(gradients)`.
 */
export class FederatedAverageAggregator implements GradientAggregator {
  readonly name = 'fedavg';

  async aggregate({ weights, gradients, learningRate }: AggregationInput): Promise<Uint8Array> {
    if (gradients.length === 0) {
      throw new InvalidGradientError('No gradients to aggregate');
    }

    const current = toFloat32(weights, 'weights');
    const sum = new Float64Array(current.length);

    gradients.forEach((blob, index) => {
      const gradient = toFloat32(blob, `gradient #${index + 1}`);
      if (gradient.length !== current.length) {
        throw new InvalidGradientError(
          `gradient #${index + 1} has ${gradient.length} values, weights have ${current.length}`
        );
      }
      for (let i = 0; i < gradient.length; i++) {
        sum[i] += gradient[i];
      }
    });

    const next = new Float32Array(current.length);
    for (let i = 0; i < current.length; i++) {
      next[i] = current[i] - learningRate * (sum[i] / gradients.length);
    }
    return encodeFloat32(next);
  }
}
