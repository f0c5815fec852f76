export * from './types';
export * from './errors';
export {
  BOOK_FACE_QUAD,
  DEFAULT_OUTPUT_SUFFIX,
  loadMockupConfig,
  type MockupConfig,
} from './config';
export { decodeImage, loadCoverImage, loadMaskImage, prepareCover, readImageFile } from './decode';
export { CONTENT_TYPES, encodeImage, imageFormatFromPath, type ImageFormat } from './encode';
export { sampleDominantColor, type ColorSampleOptions } from './color-sampler';
export { DEFAULT_TEMPLATE_COLORS, createTemplatePalette, type TemplateColor } from './template-palette';
export { colorDistance, matchTemplate } from './template-matcher';
export { computeSplatRadius, measureQuadCoverage, warpCoverToQuad } from './quad-warp';
export { smoothWarpedLayer } from './smooth';
export { compositeWithMask } from './composite';
export {
  composeMockup,
  createAssetLoader,
  generateBookMockup,
  renderBookMockup,
  resolveOutputPath,
  selectTemplate,
  type AssetLoader,
  type GenerateMockupRequest,
  type RenderOptions,
  type RenderedMockup,
} from './generate-mockup';
export { findCoverFiles, runMockupBatch, type BatchOptions, type BatchSummary } from './batch';
export { publishMockup, toDataUrl, type MockupStorageClient } from './storage';
