import { BigNumber, type BigNumberish } from "ethers";

import { ConfigurationError, InvalidMagnitudeError } from "./errors";

export const INT256_MAX = (1n << 255n) - 1n;
export const UINT256_MAX = (1n << 256n) - 1n;

export function pow10(exponent: number): bigint {
  if (!Number.isInteger(exponent) || exponent < 0) {
    throw new ConfigurationError(`Invalid decimal exponent: ${exponent}`);
  }
  return 10n ** BigInt(exponent);
}

/**
 * Reinterprets a uint256 as int256, refusing anything that would land on the sign bit.
 */
export function signed256(n: bigint): bigint {
  if (n < 0n || n > UINT256_MAX) {
    throw new InvalidMagnitudeError(`Not a uint256: ${n}`, { value: n.toString() });
  }
  if (n > INT256_MAX) {
    throw new InvalidMagnitudeError(`Value exceeds int256 max: ${n}`, { value: n.toString() });
  }
  return n;
}

export function toBigInt(value: BigNumberish): bigint {
  return BigNumber.from(value).toBigInt();
}
