import { DensityBand } from './analysis.types';

export function densityBandFor(count: number): DensityBand {
  if (count <= 0) {
    return DensityBand.Empty;
  }
  if (count <= 10) {
    return DensityBand.Sparse;
  }
  if (count <= 30) {
    return DensityBand.Moderate;
  }
  if (count <= 50) {
    return DensityBand.Dense;
  }
  return DensityBand.Packed;
}
