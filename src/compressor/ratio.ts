/**
 * Fractional size reduction between a raw and a compressed payload.
 * Accepts the payloads themselves or their byte lengths.
 *
 * @returns 1 - output/input; 0 when the input is empty. Negative when the
 * output is larger than the input.
 */
export function getCompressionRatio(
  input: ArrayLike<unknown> | number,
  output: ArrayLike<unknown> | number
): number {
  const inputLength = typeof input === 'number' ? input : input.length;
  const outputLength = typeof output === 'number' ? output : output.length;

  if (inputLength === 0) {
    return 0;
  }
  return 1 - outputLength / inputLength;
}
