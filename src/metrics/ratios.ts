import { byOrg, slidingWindowValue } from "./windows.js";
import { InvalidWindowSpecError, UndefinedRatioError } from "../errors.js";
import type { Dataset, RatioSeries } from "../types.js";

export const DAU_WINDOW_DAYS = 1;
export const MAU_WINDOW_DAYS = 30;

/**
 * Daily over monthly (30-day) active organizations for every day with a full
 * monthly window. Dates are the window ends.
 */
export function dauOverMau(records: Dataset): RatioSeries {
  const dau = slidingWindowValue(records, byOrg, DAU_WINDOW_DAYS);
  const mau = slidingWindowValue(records, byOrg, MAU_WINDOW_DAYS);

  // both series end on the same day; keep the DAU tail that has a monthly window
  const alignedDau = dau.counts.slice(dau.counts.length - mau.counts.length);
  const ratios = mau.counts.map((monthly, index) => {
    if (monthly === 0) {
      throw new UndefinedRatioError("DAU/MAU", mau.dates[index]);
    }
    return alignedDau[index] / monthly;
  });
  return { ratios, dates: mau.dates };
}

/**
 * Expanding mean: entry `i` is the mean of `values[0..i]`. Not a fixed-width
 * moving window.
 */
export function movingAverage(values: readonly number[]) {
  const result: number[] = [];
  let sum = 0;
  values.forEach((value, index) => {
    sum += value;
    result.push(sum / (index + 1));
  });
  return result;
}

/**
 * Gaussian-smoothed trend over the whole series. The kernel is as long as the
 * series; the tail is padded with the last value for half the kernel so the end
 * of the curve does not fall off.
 */
export function trendline(values: readonly number[], stdDev = 7) {
  if (!Number.isFinite(stdDev) || stdDev <= 0) {
    throw new InvalidWindowSpecError("stdDev", stdDev, "must be positive");
  }
  const n = values.length;
  if (n <= 1) return [...values];

  const half = Math.floor(n / 2);
  const kernel = gaussianKernel(n, stdDev);
  const padded = [...values, ...Array<number>(half).fill(values[n - 1])];
  return convolveSame(padded, kernel).slice(0, n);
}

function gaussianKernel(size: number, stdDev: number) {
  const center = (size - 1) / 2;
  const weights = Array.from({ length: size }, (_, k) => Math.exp(-0.5 * ((k - center) / stdDev) ** 2));
  const total = weights.reduce((acc, weight) => acc + weight, 0);
  return weights.map((weight) => weight / total);
}

/** Centered discrete convolution, output as long as `signal`. */
function convolveSame(signal: number[], kernel: number[]) {
  const offset = Math.floor((kernel.length - 1) / 2);
  return signal.map((_, index) => {
    const k = index + offset;
    let acc = 0;
    for (let j = 0; j < kernel.length; j += 1) {
      const source = k - j;
      if (source >= 0 && source < signal.length) {
        acc += kernel[j] * signal[source];
      }
    }
    return acc;
  });
}
