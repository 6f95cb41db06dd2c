export interface LinearFit {
  readonly slope: number;
  readonly intercept: number;
}

/**
 * Ordinary least-squares fit of y on x.
 *
 * Sums are taken around the means so epoch-second x values keep their
 * precision. When every x is the same the line is flat through mean(y).
 */
export function fitLeastSquares(xs: readonly number[], ys: readonly number[]): LinearFit {
  if (xs.length === 0 || xs.length !== ys.length) {
    throw new RangeError(`cannot fit ${xs.length} x values against ${ys.length} y values`);
  }

  const n = xs.length;
  const meanX = xs.reduce((sum, x) => sum + x, 0) / n;
  const meanY = ys.reduce((sum, y) => sum + y, 0) / n;

  let sxx = 0;
  let sxy = 0;
  xs.forEach((x, i) => {
    const dx = x - meanX;
    sxx += dx * dx;
    sxy += dx * ((ys[i] ?? meanY) - meanY);
  });

  const slope = sxx === 0 ? 0 : sxy / sxx;
  return { slope, intercept: meanY - slope * meanX };
}

export function project(fit: LinearFit, x: number): number {
  return fit.intercept + fit.slope * x;
}
