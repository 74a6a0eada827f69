import type { PageGeometry, Point, Raster, Size, StampResolution } from '@/types/stamp';
import { createPlacementStore, type PlacementStoreApi } from '@/store/placementStore';
import { validateConfig, type StampConfig } from './config';
import { ConfigError, StateLockedError, type DegradedResolution } from './errors';
import { DragStateMachine, type RedrawListener } from './dragStateMachine';
import { formatInvocation, serializeInvocation } from './invocation';
import { createLogger } from './logger';
import { writeOutputAtomically } from './outputFile';
import { splicePage } from './pageSplice';
import type { PreviewRenderer } from './pdfLoader';
import { PdfLibEngine, type PagedDocumentEngine } from './pdfManipulation';
import { compositePreview } from './previewCompositor';
import { prepareStampJob, type StampJob } from './stampJob';
import { computeTransform, previewTarget } from './transformCompositor';
import { fitPreviewDensity } from './units';

const log = createLogger('SESSION');

export const SCALE_PERCENT_MIN = 1;
export const SCALE_PERCENT_MAX = 200;

export interface StampSessionOptions {
  config: StampConfig;
  renderer: PreviewRenderer;
  engine?: PagedDocumentEngine;
  /** Initial preview density; defaults to 72 until a viewport is set */
  previewDensity?: number;
}

/**
 * Headless interactive session. A GUI forwards pointer events and slider changes in
 * and listens for redraw requests; it never touches the placement state directly.
 */
export class StampSession {
  readonly placement: PlacementStoreApi;
  private readonly drag: DragStateMachine;
  private readonly listeners = new Set<RedrawListener>();
  private lastOutput: string | undefined;
  private writing = false;

  constructor(
    private readonly config: StampConfig,
    private readonly job: StampJob,
    private readonly engine: PagedDocumentEngine,
    private readonly renderer: PreviewRenderer,
    previewDensity: number = 72
  ) {
    this.lastOutput = config.output;
    this.placement = createPlacementStore({
      positionMM: { x: config.x, y: config.y },
      scale: config.scale,
    });
    this.drag = new DragStateMachine({
      store: this.placement,
      previewDensity,
      onRedraw: () => this.requestRedraw(),
    });
  }

  get geometry(): PageGeometry {
    return this.job.geometry;
  }

  get resolution(): StampResolution {
    return this.job.resolution;
  }

  get diagnostic(): DegradedResolution | null {
    return this.job.diagnostic;
  }

  get pageNumber(): number {
    return this.job.pageNumber;
  }

  get previewDensity(): number {
    return this.drag.getPreviewDensity();
  }

  get outputPath(): string | undefined {
    return this.lastOutput;
  }

  /** True from the start of a splice until its output file is in place. */
  get busy(): boolean {
    return this.writing || this.placement.getState().locked;
  }

  onRedraw(listener: RedrawListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Size the preview so the page fills 80% of the viewport. */
  setViewport(viewport: Size): number {
    const density = fitPreviewDensity(this.job.geometry, viewport);
    this.drag.setPreviewDensity(density);
    this.requestRedraw();
    return density;
  }

  pointerDown(point: Point): boolean {
    return this.drag.pointerDown(point);
  }

  pointerMove(point: Point): boolean {
    return this.drag.pointerMove(point);
  }

  pointerUp(): boolean {
    return this.drag.pointerUp();
  }

  /** Returns false when a save holds the placement. */
  setScale(scale: number): boolean {
    if (this.busy) return false;
    this.placement.getState().setScale(scale);
    this.requestRedraw();
    return true;
  }

  setScalePercent(percent: number): boolean {
    if (!Number.isInteger(percent) || percent < SCALE_PERCENT_MIN || percent > SCALE_PERCENT_MAX) {
      throw new ConfigError(`Scale percent must be an integer in ${SCALE_PERCENT_MIN}-${SCALE_PERCENT_MAX}, got ${percent}`);
    }
    return this.setScale(percent / 100);
  }

  scalePercent(): number {
    return Math.round(this.placement.getState().scale * 100);
  }

  /** Render the page at the preview density with the stamp drawn where it currently sits. */
  async renderPreview(): Promise<Raster> {
    const density = this.drag.getPreviewDensity();
    const snapshot = this.placement.getState().snapshot();
    const page = await this.renderer.renderPageToRaster(
      this.job.document,
      this.job.pageNumber,
      density,
      this.job.geometry
    );
    const transform = computeTransform(snapshot, previewTarget(density), this.job.resolution);
    return compositePreview(page, this.job.stamp, transform);
  }

  async save(): Promise<string> {
    if (!this.lastOutput) {
      throw new ConfigError('No output file chosen yet; use saveAs');
    }
    await this.write(this.lastOutput);
    return this.lastOutput;
  }

  async saveAs(outputPath: string): Promise<string> {
    await this.write(outputPath);
    this.lastOutput = outputPath;
    return outputPath;
  }

  /** Command line reproducing the current placement and last output. */
  printInvocation(): string {
    const invocation = serializeInvocation(
      { ...this.config, output: this.lastOutput },
      this.placement.getState().snapshot()
    );
    const line = formatInvocation(invocation);
    log.info(line);
    return line;
  }

  private async write(outputPath: string): Promise<void> {
    if (this.busy) {
      throw new StateLockedError('A save is already in progress');
    }
    this.writing = true;
    try {
      const bytes = await splicePage({
        engine: this.engine,
        document: this.job.document,
        pageNumber: this.job.pageNumber,
        numPages: this.job.numPages,
        geometry: this.job.geometry,
        placement: this.placement,
        resolution: this.job.resolution,
        stamp: this.job.stamp,
      });
      await writeOutputAtomically(outputPath, bytes);
    } finally {
      this.writing = false;
    }
  }

  private requestRedraw(): void {
    this.listeners.forEach(listener => listener());
  }
}

export async function openStampSession(options: StampSessionOptions): Promise<StampSession> {
  const config = validateConfig(options.config);
  const engine = options.engine ?? new PdfLibEngine();
  const job = await prepareStampJob(config, engine);
  log.info(`Opened page ${job.pageNumber} of ${job.numPages}`, { resolution: job.resolution });
  return new StampSession(config, job, engine, options.renderer, options.previewDensity);
}
