import { USAGE, parseCliArgs } from './config';
import { CollaboratorError, isStampError } from './errors';
import { formatInvocation, serializeInvocation } from './invocation';
import { createLogger, setLogLevel } from './logger';
import { stampPdf, type StampPdfDeps } from './batchStamp';

const log = createLogger('CLI');

/**
 * Run the batch command line and return the process exit code:
 * 0 success, 1 a reported StampError, 2 anything unexpected.
 */
export async function runCli(argv: string[], deps: StampPdfDeps = {}): Promise<number> {
  try {
    const options = parseCliArgs(argv);
    setLogLevel(options.logLevel);

    if (options.help) {
      console.log(USAGE);
      return 0;
    }

    const { config } = options;
    const result = await stampPdf(config, deps);

    if (result.diagnostic) {
      log.warn(`Stamp size assumes ${result.diagnostic.densityPerInch} DPI; pass --stamp-dpi to set it`);
    }
    if (options.print) {
      const invocation = serializeInvocation(config, {
        positionMM: { x: config.x, y: config.y },
        scale: config.scale,
        dragOffsetMM: { dx: 0, dy: 0 },
        dragging: false,
        locked: false,
      });
      console.log(formatInvocation(invocation));
    }
    return 0;
  } catch (error) {
    if (isStampError(error)) {
      const detail = error instanceof CollaboratorError ? ` (step: ${error.step})` : '';
      console.error(`Error [${error.code}]: ${error.message}${detail}`);
      return 1;
    }
    log.error('Unexpected failure', {
      message: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    return 2;
  }
}
