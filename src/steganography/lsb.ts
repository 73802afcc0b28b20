import { LSB_CLEAR_MASK, LSB_MASK } from '../utils/constants';
import { assertBitString } from '../utils/binary-codec';
import { ErrorFactory } from '../utils/error-factory';

/**
 * Flat sample storage the LSB primitives work on
 */
export type SampleArray = Uint8Array | Int16Array;

/**
 * Throw a CapacityError when a payload does not fit
 */
export function assertCapacity(required: number, capacity: number): void {
  if (required > capacity) {
    throw ErrorFactory.CAPACITY(required, capacity);
  }
}

/**
 * Overwrite the LSB of samples[i] with bits[i].
 * Writes into the given array; callers pass a copy they own.
 */
export function overwriteLsb(samples: SampleArray, bits: string): void {
  assertBitString(bits);
  assertCapacity(bits.length, samples.length);

  for (let i = 0; i < bits.length; i++) {
    const bit = bits.charCodeAt(i) === 49 ? 1 : 0; // '1'
    // Clear the LSB and set it to our data bit
    samples[i] = (samples[i] & LSB_CLEAR_MASK) | bit;
  }
}

/**
 * Read the LSB of the first maxBits samples, or of every sample
 */
export function readLsb(samples: SampleArray, maxBits?: number): string {
  if (maxBits !== undefined && !Number.isInteger(maxBits)) {
    throw ErrorFactory.INVALID_INPUT(`maxBits must be an integer, got ${maxBits}`);
  }
  const count = maxBits === undefined ? samples.length : Math.min(Math.max(0, maxBits), samples.length);
  const bits: string[] = new Array<string>(count);
  for (let i = 0; i < count; i++) {
    bits[i] = (samples[i] & LSB_MASK) === 1 ? '1' : '0';
  }
  return bits.join('');
}
