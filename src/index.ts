export { DoubleDouble, twoProduct, twoSum } from "./fractals/mandelbrot/double-double";
export {
  addDD,
  createComplexDD,
  ddToStd,
  isComplexDD,
  magnitudeDD,
  magnitudeSquaredDD,
  multiplyDD,
  negateDD,
  scaleDD,
  squareDD,
  stdToDD,
  subtractDD,
  ZERO_DD,
} from "./fractals/mandelbrot/dd-math";
export {
  decimalPointToDD,
  isBeyondPrecisionFloor,
  PrecisionLevel,
  requiredDigits,
  resolveCenter,
} from "./fractals/mandelbrot/conversions";
export {
  assertIterationBudget,
  attachSeries,
  computeReferenceOrbit,
  computeReferenceOrbitWithSeries,
  DEFAULT_DRIFT_THRESHOLD,
  ESCAPE_RADIUS_SQUARED,
  MAX_ORBIT_ITERATIONS,
  needsReferenceRecompute,
  orbitPoint,
  screenDiagonalSquared,
} from "./fractals/mandelbrot/reference-orbit";
export { computeReferenceOrbitDD, projectOrbitDD } from "./fractals/mandelbrot/reference-orbit-dd";
export {
  computeSeriesCoefficients,
  SERIES_TOLERANCE,
  seedDelta,
  seriesCoefficients,
  skipIterations,
} from "./fractals/mandelbrot/series-approximation";
export {
  computeGlitchFlags,
  GLITCH_MIN_REFERENCE_MAGNITUDE_SQUARED,
  GLITCH_TOLERANCE,
  iteratePerturbation,
} from "./fractals/mandelbrot/delta-orbit";
export type { PerturbationOptions, PerturbationResult, ViewGeometry } from "./fractals/mandelbrot/delta-orbit";
export { DEFAULT_GLITCH_DETECTOR_OPTIONS, GlitchDetector } from "./fractals/mandelbrot/glitch-detector";
export type { GlitchCluster, GlitchDetectorOptions, GlitchedPixel } from "./fractals/mandelbrot/glitch-detector";
export { GlitchMask } from "./fractals/mandelbrot/glitch-mask";
export { MultiReferenceManager } from "./fractals/mandelbrot/multi-reference";
export type {
  MultiReferenceBuffers,
  MultiReferenceOptions,
  ReferenceRegion,
} from "./fractals/mandelbrot/multi-reference";
export type {
  ComplexDD,
  ComplexStd,
  OrbitPoints,
  ReferenceOrbit,
  ReferenceOrbitDD,
  SeriesApproximation,
} from "./fractals/mandelbrot/types";
export { DEFAULT_ENGINE_CONFIG, resolveEngineConfig } from "./fractals/render/config";
export type { EngineConfig, EngineConfigOverrides, KernelCapabilities, ModeThresholds } from "./fractals/render/config";
export { selectKernelVariant, selectRenderingState } from "./fractals/render/mode-selector";
export type { KernelVariant, RenderingMode, RenderingState } from "./fractals/render/mode-selector";
export {
  createMultiReferenceParams,
  createPerturbationParams,
  packComplexPoints,
  packOrbit,
  packRegionBounds,
  packRegionCenters,
  packRegionOffsets,
  packSeries,
  splitDouble,
} from "./fractals/render/gpu-packing";
export type {
  FloatPair,
  MultiReferenceParams,
  PerturbationParams,
  RegionBounds,
  RegionLayout,
} from "./fractals/render/gpu-packing";
export { PerturbationEngine } from "./fractals/render/perturbation-engine";
export type { EngineMetrics, EngineState } from "./fractals/render/perturbation-engine";
export { PerformanceMonitor } from "./lib/performance-monitor";
export type { OrbitMetrics, RecomputeKind, RecomputeSessionMetrics } from "./lib/performance-monitor";
export { complexToPixel, normalizedToComplex, pixelToComplex, pixelToDeltaC } from "./lib/coordinates";
