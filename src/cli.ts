#!/usr/bin/env node
import { Command, Option } from 'commander';

import type { RecognitionService } from './service.js';
import type { Configuration } from './types.js';

import {
  applyCliOverrides,
  buildPreprocessOptions,
  buildRecognitionParams,
  collectOption,
  formatFailureLine,
  formatSuccessLine,
  imageInputFromArgument,
  parseNumberOption,
  parsePositiveNumberOption,
  parseThresholdOption,
  type RecognizeCliOptions,
} from './cli-options.js';
import { loadConfiguration } from './config.js';
import { invalidParameter, toErrorResponse } from './errors.js';
import { SharpImageLoader, type ImageInput } from './image/image-loader.js';
import { preprocessImage, type PreprocessOptions } from './image/preprocess.js';
import { createStructuredLogger, type StructuredLogger } from './logging/structured-logger.js';
import { CommandOracle } from './oracle/command-oracle.js';
import { classifyResult } from './result-classifier.js';
import { createRecognitionService } from './service.js';
import { initTelemetry, shutdownTelemetry } from './telemetry/index.js';
import { VERSION } from './version.js';

const EXIT_RECOGNITION_FAILED = 1;
const EXIT_SETUP_FAILED = 2;

const writeLine = (stream: NodeJS.WriteStream, line: string): void => {
  stream.write(`${line}\n`);
};

function buildService(config: Configuration, logger: StructuredLogger): RecognitionService {
  const command = config.oracle.command;
  if (command === undefined) {
    throw invalidParameter('No OCR command configured (set oracle.command, OCR_COMMAND or --oracle-command)');
  }
  const oracle = new CommandOracle({
    command,
    args: config.oracle.args,
    timeoutMs: config.recognition.timeoutMs,
  });
  return createRecognitionService({ config, oracle, logger });
}

async function prepareInput(input: ImageInput, config: Configuration, preprocess: PreprocessOptions | undefined): Promise<ImageInput> {
  if (preprocess === undefined) return input;
  const raw = await new SharpImageLoader({
    maxBytes: config.recognition.maxImageSize,
    minBytes: config.recognition.minImageSize,
    validate: false,
  }).load(input);
  return await preprocessImage(raw, preprocess);
}

async function runRecognize(images: string[], options: RecognizeCliOptions): Promise<number> {
  let config: Configuration;
  let service: RecognitionService;
  try {
    config = applyCliOverrides(loadConfiguration({ path: options.config }).config, options);
    initTelemetry({ enabled: config.telemetry.enabled, labels: config.telemetry.labels });
    const logger = createStructuredLogger({
      format: config.logging.format,
      level: config.logging.level,
      labels: config.telemetry.labels,
      color: process.stderr.isTTY,
    });
    service = buildService(config, logger);
  } catch (e) {
    const response = toErrorResponse(e);
    writeLine(process.stderr, `captcha-ocr: error ${String(response.error_code)}: ${response.message}`);
    return EXIT_SETUP_FAILED;
  }

  const challengeType = config.recognition.defaultType;
  const params = buildRecognitionParams(challengeType, options);
  const preprocess = buildPreprocessOptions(options);
  const json = options.json === true;
  let failures = 0;

  // Sequential on purpose: repeated images hit the cache.
  for (const image of images) {
    try {
      const input = await prepareInput(imageInputFromArgument(image), config, preprocess);
      const outcome = await service.recognizeDetailed(input, challengeType, params);
      const resultClass = options.classify === true ? classifyResult(outcome.result) : undefined;
      writeLine(process.stdout, formatSuccessLine({ image, outcome, resultClass }, json));
    } catch (e) {
      failures += 1;
      writeLine(json ? process.stdout : process.stderr, formatFailureLine(image, e, json));
    }
  }

  if (options.stats === true) {
    writeLine(process.stderr, JSON.stringify(await service.stats()));
  }
  return failures > 0 ? EXIT_RECOGNITION_FAILED : 0;
}

function runTypes(): void {
  // Built-in processors only; the oracle is never called here.
  const service = createRecognitionService({
    config: loadConfiguration().config,
    oracle: { classification: () => Promise.reject(new Error('oracle not available')) },
  });
  service.registry.knownTypes().forEach((type) => {
    writeLine(process.stdout, type);
  });
}

const program = new Command();

program
  .name('captcha-ocr')
  .description('Recognize text and arithmetic captchas through an OCR command')
  .version(VERSION);

program
  .command('recognize')
  .description('Recognize one or more captcha images (paths or data: URLs)')
  .argument('<images...>', 'Image files or base64 data URLs')
  .option('-t, --type <type>', 'Challenge type (text, calculation)')
  .option('--config <path>', 'Configuration file (YAML or JSON)')
  .option('--oracle-command <command>', 'OCR command; reads image bytes on stdin, prints text on stdout')
  .option('--oracle-arg <arg>', 'Argument for the OCR command (repeatable)', collectOption, [])
  .option('--timeout <seconds>', 'OCR timeout in seconds', parsePositiveNumberOption)
  .option('--return-expression', 'calculation: print the matched expression instead of its value')
  .option('--as-float', 'calculation: keep a fractional part on integral values')
  .option('--keep-spaces', 'text: keep spaces in the result')
  .option('--lower', 'text: lowercase the result')
  .option('--upper', 'text: uppercase the result')
  .option('-p, --preprocess', 'Enhance the image before recognition')
  .option('--no-grayscale', 'preprocess: keep colour channels')
  .option('-c, --contrast <factor>', 'preprocess: contrast factor', parseNumberOption)
  .option('-s, --sharpness <factor>', 'preprocess: sharpening factor', parseNumberOption)
  .addOption(new Option('-n, --noise <method>', 'preprocess: denoise method').choices(['median', 'gaussian', 'none']))
  .option('--threshold <value>', 'preprocess: binarization threshold (0..255)', parseThresholdOption)
  .option('--classify', 'Append the character class of each result')
  .option('--json', 'Print one JSON envelope per image')
  .option('--stats', 'Print cache statistics to stderr when done')
  .action(async (images: string[], options: RecognizeCliOptions) => {
    try {
      process.exitCode = await runRecognize(images, options);
    } finally {
      shutdownTelemetry();
    }
  });

program
  .command('types')
  .description('List registered challenge types')
  .action(() => {
    runTypes();
  });

program.parseAsync(process.argv).catch((e: unknown) => {
  const response = toErrorResponse(e);
  writeLine(process.stderr, `captcha-ocr: error ${String(response.error_code)}: ${response.message}`);
  process.exitCode = EXIT_SETUP_FAILED;
});
