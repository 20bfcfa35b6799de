/**
 * multiflash - write one image to several drives in parallel
 */

import type { FlashLogger, FlashTarget, MonitorReport } from '@multiflash/flasher';
import { Flasher, errorMessage, silentLogger } from '@multiflash/flasher';
import { DeviceManager } from '@multiflash/device-manager';
import type { BlockDevice } from '@multiflash/device-manager';
import { parseArgs } from './args';
import type { CliOptions } from './args';
import { confirm } from './confirm';
import { printHelp, printSuccess, printWarning, stderrLogger } from './ui/output';
import { ProgressView, imageLine, taskLine } from './ui/progress';

type CompleteReport = Extract<MonitorReport, { kind: 'complete' }>;

export interface CliContext {
  createFlasher: (logger: FlashLogger) => Flasher;
  createDeviceManager: (logger: FlashLogger) => Pick<DeviceManager, 'listTargets' | 'resolveTargets'>;
  confirm: (question: string) => Promise<boolean>;
  progress: ProgressView;
}

export function defaultContext(): CliContext {
  return {
    createFlasher: (logger) => new Flasher({ onLog: logger }),
    createDeviceManager: (logger) => new DeviceManager({ logger }),
    confirm,
    progress: new ProgressView(),
  };
}

/**
 * Run the command line; resolves with the process exit code. Errors that stop
 * the run before flashing reject.
 */
export async function run(argv: readonly string[], context: CliContext = defaultContext()): Promise<number> {
  const parsed = parseArgs(argv);
  if (parsed.help) {
    printHelp();
    return 0;
  }

  const { options } = parsed;
  const logger = options.verbose ? stderrLogger : silentLogger;
  const flasher = context.createFlasher(logger);
  const devices = context.createDeviceManager(logger);

  let lastRead = 0;
  let lastTotal = 0;
  const loaded = await flasher.selectImage(options.image, (bytesRead, totalSize) => {
    lastRead = bytesRead;
    lastTotal = totalSize;
    context.progress.draw([imageLine(bytesRead, totalSize)]);
  });
  if (!loaded.success) {
    throw loaded.error;
  }
  context.progress.finish([imageLine(lastRead, lastTotal)]);

  const { disks, listed } = await diskArgs(options, devices);
  if (disks.length === 0) {
    throw new Error('no disks specified');
  }

  let targets: FlashTarget[];
  try {
    targets = await devices.resolveTargets(disks, {
      imagePath: options.image,
      unmount: options.unmount,
      devices: listed,
    });
  } catch (error) {
    throw new Error(`disk error: ${errorMessage(error)}`);
  }

  if (!options.yes) {
    console.log(`Are you sure you want to flash '${options.image}' to the following drives?`);
    for (const target of targets) {
      console.log(`  - ${target.label ?? target.deviceId}`);
    }
    if (!(await context.confirm('y/N: '))) {
      throw new Error('exiting without flashing');
    }
  }

  console.log('');
  flasher.startFlash(targets, { verify: options.check });
  const report = await untilComplete(flasher, (tasks) => context.progress.draw(tasks));
  context.progress.finish(report.tasks.map(taskLine));

  if (report.errors.length === 0) {
    printSuccess(report.summary);
    return 0;
  }

  printWarning(report.summary);
  for (const { deviceId, reason } of report.errors) {
    console.log(`  - ${deviceId}: ${reason.message}`);
  }
  return 1;
}

async function diskArgs(
  options: CliOptions,
  devices: Pick<DeviceManager, 'listTargets'>
): Promise<{ disks: string[]; listed?: BlockDevice[] }> {
  if (!options.all) {
    return { disks: options.disks };
  }
  let listed: BlockDevice[];
  try {
    listed = await devices.listTargets();
  } catch (error) {
    throw new Error(`error getting USB disks: ${errorMessage(error)}`);
  }
  return { disks: listed.map((device) => device.path), listed };
}

function untilComplete(flasher: Flasher, onLines: (lines: string[]) => void): Promise<CompleteReport> {
  return new Promise((resolve, reject) => {
    flasher.watch((report) => {
      if (report.kind === 'flashing') {
        onLines(report.tasks.map(taskLine));
      } else if (report.kind === 'complete') {
        resolve(report);
      }
    }, reject);
  });
}
