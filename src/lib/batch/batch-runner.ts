/**
 * Batch Runner
 *
 * Extracts outlines for every PDF in a directory and writes one JSON file per
 * document. Documents are independent, so they run with bounded concurrency;
 * a failing or overrunning document is logged and counted without stopping
 * the rest of the batch.
 */

import { mkdir, readdir, readFile, writeFile } from 'fs/promises'
import path from 'path'
import { Config, Duration, Effect, pipe } from 'effect'
import { collectDocument, residentMemoryMb } from '../pdf-service/collector'
import { makePdfServiceScoped, type PdfLoaderTag, type PdfServiceError } from '../pdf-service/index'
import { DEFAULT_OUTLINE_CONFIG, type OutlineConfig } from '../pipeline/config'
import { toOutlineJson } from '../pipeline/outline-assembler'
import { extractOutline } from '../pipeline/outline-pipeline'
import {
  BatchInputError,
  type DocumentError,
  DocumentProcessingError,
  TimeoutError,
} from '../pipeline/types/errors'
import type { ScriptProfile } from '../pipeline/types/outline'

// ============================================================================
// Types
// ============================================================================

export interface BatchOptions {
  inputDir: string
  outputDir: string
  /** Documents processed at once (default: 4) */
  concurrency?: number
  /** Deadline per document (default: 10 seconds) */
  timeout?: Duration.DurationInput
  /** Target average time per document, for the summary (default: 10000) */
  perFileBudgetMs?: number
  config?: OutlineConfig
  /** Stop reading pages of a document once resident memory reaches this many MB */
  memoryLimitMb?: number
  /** Called as each document finishes, in completion order */
  onFileComplete?: (report: FileReport) => void
}

export interface FileMetrics {
  processingTimeMs: number
  pagesProcessed: number
  headingsFound: number
  language: ScriptProfile
  /** Resident memory of the process after the document, in MB */
  memoryUsageMb: number
}

export type FileReport =
  | { fileName: string; status: 'success'; outputPath: string; metrics: FileMetrics }
  | { fileName: string; status: 'failed'; error: string; errorTag: string }

export interface BatchSummary {
  total: number
  successful: number
  failed: number
  totalTimeMs: number
  averageTimeMs: number
  /** Percentage of documents that succeeded */
  successRate: number
  withinBudget: boolean
  /** Reports in file-name order */
  reports: FileReport[]
}

// ============================================================================
// Configuration
// ============================================================================

/**
 * Batch settings from OUTLINE_INPUT_DIR, OUTLINE_OUTPUT_DIR,
 * OUTLINE_CONCURRENCY, OUTLINE_TIMEOUT_MS and OUTLINE_MEMORY_LIMIT_MB.
 */
export const batchSettings = Config.all({
  inputDir: Config.string('OUTLINE_INPUT_DIR').pipe(Config.withDefault('./input')),
  outputDir: Config.string('OUTLINE_OUTPUT_DIR').pipe(Config.withDefault('./output')),
  concurrency: Config.integer('OUTLINE_CONCURRENCY').pipe(
    Config.validate({ message: 'OUTLINE_CONCURRENCY must be at least 1', validation: n => n >= 1 }),
    Config.withDefault(4),
  ),
  timeoutMs: Config.integer('OUTLINE_TIMEOUT_MS').pipe(
    Config.validate({ message: 'OUTLINE_TIMEOUT_MS must be positive', validation: n => n > 0 }),
    Config.withDefault(10_000),
  ),
  memoryLimitMb: Config.number('OUTLINE_MEMORY_LIMIT_MB').pipe(
    Config.validate({ message: 'OUTLINE_MEMORY_LIMIT_MB must be positive', validation: n => n > 0 }),
    Config.withDefault(512),
  ),
})

// ============================================================================
// Helpers
// ============================================================================

export function isPdfFile(fileName: string): boolean {
  return fileName.toLowerCase().endsWith('.pdf')
}

export function outputFileName(fileName: string): string {
  return fileName.replace(/\.pdf$/i, '.json')
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

type FileError = DocumentError | PdfServiceError

// ============================================================================
// Single Document
// ============================================================================

function processFile(
  fileName: string,
  options: BatchOptions,
): Effect.Effect<FileReport, never, PdfLoaderTag> {
  const {
    inputDir,
    outputDir,
    config = DEFAULT_OUTLINE_CONFIG,
    timeout = '10 seconds',
    memoryLimitMb,
  } = options
  const inputPath = path.join(inputDir, fileName)
  const outputPath = path.join(outputDir, outputFileName(fileName))

  const work: Effect.Effect<FileReport, FileError, PdfLoaderTag> = Effect.scoped(
    Effect.gen(function*() {
      const startTime = Date.now()

      const data = yield* Effect.tryPromise({
        try: () => readFile(inputPath),
        catch: error =>
          new DocumentProcessingError({
            message: `Failed to read ${inputPath}: ${describe(error)}`,
            fileName,
            cause: error,
          }),
      })

      const pdf = yield* makePdfServiceScoped(new Uint8Array(data))
      const document = yield* collectDocument(pdf, {
        maxPages: config.document.maxPages,
        memoryLimitMb,
      })
      const { outline, metadata } = yield* extractOutline(document, config)

      const json = JSON.stringify(toOutlineJson(outline), null, 2)
      yield* Effect.tryPromise({
        try: () => writeFile(outputPath, json, 'utf-8'),
        catch: error =>
          new DocumentProcessingError({
            message: `Failed to write ${outputPath}: ${describe(error)}`,
            fileName,
            cause: error,
          }),
      })

      const report: FileReport = {
        fileName,
        status: 'success',
        outputPath,
        metrics: {
          processingTimeMs: Date.now() - startTime,
          pagesProcessed: metadata.pagesProcessed,
          headingsFound: metadata.headingsFound,
          language: metadata.language,
          memoryUsageMb: Math.round(residentMemoryMb() * 100) / 100,
        },
      }
      return report
    }),
  )

  return pipe(
    work,
    Effect.timeoutFail({
      duration: timeout,
      onTimeout: () =>
        new TimeoutError({
          message: `Processing timed out after ${Duration.format(Duration.decode(timeout))}`,
          fileName,
        }),
    }),
    Effect.tap(report => Effect.logInfo(`Completed ${report.fileName}`)),
    Effect.catchAll(error =>
      pipe(
        Effect.logWarning(`Error processing ${fileName}: ${error.message}`),
        Effect.as<FileReport>({
          fileName,
          status: 'failed',
          error: error.message,
          errorTag: error._tag,
        }),
      )
    ),
    Effect.tap(report => Effect.sync(() => options.onFileComplete?.(report))),
    Effect.annotateLogs({ file: fileName }),
  )
}

// ============================================================================
// Main Export
// ============================================================================

/**
 * Process every `*.pdf` of `inputDir` into `outputDir/<name>.json`.
 *
 * Fails only when the input directory cannot be listed or the output
 * directory cannot be created.
 */
export function runBatch(
  options: BatchOptions,
): Effect.Effect<BatchSummary, BatchInputError, PdfLoaderTag> {
  const { inputDir, outputDir, concurrency = 4, perFileBudgetMs = 10_000 } = options

  return Effect.gen(function*() {
    const startTime = Date.now()

    const entries = yield* Effect.tryPromise({
      try: () => readdir(inputDir),
      catch: error =>
        new BatchInputError({
          message: `Cannot list input directory: ${describe(error)}`,
          directory: inputDir,
          cause: error,
        }),
    })
    const files = entries.filter(isPdfFile).sort()

    yield* Effect.tryPromise({
      try: () => mkdir(outputDir, { recursive: true }),
      catch: error =>
        new BatchInputError({
          message: `Cannot create output directory: ${describe(error)}`,
          directory: outputDir,
          cause: error,
        }),
    })

    if (files.length === 0) {
      yield* Effect.logWarning(`No PDF files found in ${inputDir}`)
    } else {
      yield* Effect.logInfo(`Starting processing of ${files.length} PDF file(s)`)
    }

    const reports = yield* Effect.forEach(files, file => processFile(file, options), {
      concurrency,
    })

    const totalTimeMs = Date.now() - startTime
    const successful = reports.filter(r => r.status === 'success').length
    const averageTimeMs = files.length ? totalTimeMs / files.length : 0

    return {
      total: files.length,
      successful,
      failed: files.length - successful,
      totalTimeMs,
      averageTimeMs,
      successRate: files.length ? (successful / files.length) * 100 : 0,
      withinBudget: averageTimeMs <= perFileBudgetMs,
      reports,
    }
  })
}
