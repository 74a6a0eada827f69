export * from '@/types/stamp';
export * from '@/lib/units';
export * from '@/lib/errors';
export { createLogger, setLogLevel, getLogLevel, type LogLevel, type Logger } from '@/lib/logger';
export { probeDensityMetadata, decodeStamp, sniffStampFormat } from '@/lib/imageMetadata';
export { resolveStampDensity, FALLBACK_DENSITY, type ResolvedStampDensity } from '@/lib/stampResolution';
export {
  createPlacementStore,
  foldPosition,
  type PlacementStore,
  type PlacementStoreApi,
  type PlacementInit,
} from '@/store/placementStore';
export {
  computeTransform,
  applyTransform,
  invertTransform,
  stampBounds,
  previewTarget,
  pageTarget,
} from '@/lib/transformCompositor';
export { DragStateMachine, type DragPhase, type RedrawListener } from '@/lib/dragStateMachine';
export { PdfLibEngine, type PagedDocumentEngine } from '@/lib/pdfManipulation';
export { overlayRect, canvasBoundsToPdfRect } from '@/lib/stampOverlay';
export { splicePage, resolvePageIndex, type SplicePageParams } from '@/lib/pageSplice';
export { serializeInvocation, formatInvocation } from '@/lib/invocation';
export { PdfjsPreviewRenderer, type PreviewRenderer } from '@/lib/pdfLoader';
export { compositePreview } from '@/lib/previewCompositor';
export { DEFAULT_CONFIG, parseCliArgs, validateConfig, autoOutputPath, type StampConfig } from '@/lib/config';
export { writeOutputAtomically, readInputFile } from '@/lib/outputFile';
export { prepareStampJob, type StampJob } from '@/lib/stampJob';
export { stampPdf, type StampPdfResult } from '@/lib/batchStamp';
export { StampSession, openStampSession, type StampSessionOptions } from '@/lib/stampSession';
export { runCli } from '@/lib/cli';
