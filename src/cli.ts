/**
 * Command-line entry point: extract outlines for every PDF in the input
 * directory and print a processing summary.
 *
 * Settings come from the environment (or a .env file):
 *   OUTLINE_INPUT_DIR, OUTLINE_OUTPUT_DIR, OUTLINE_CONCURRENCY,
 *   OUTLINE_TIMEOUT_MS, OUTLINE_MEMORY_LIMIT_MB, OUTLINE_LOG_LEVEL and the
 *   OUTLINE_* thresholds of loadOutlineConfig.
 *
 * Per-file progress is printed here, so Effect logs default to errors only.
 */

import { config as loadEnv } from 'dotenv'
import { Config, Duration, Effect, Logger, LogLevel } from 'effect'
import { type BatchSummary, type FileReport, batchSettings, runBatch } from './lib/batch/batch-runner'
import { NodePdfLoaderLive } from './lib/pdf-service/index'
import { loadOutlineConfig } from './lib/pipeline/index'

loadEnv()

const RULE = '='.repeat(60)

function printReport(report: FileReport): void {
  if (report.status === 'failed') {
    console.log(`✗ Error processing ${report.fileName}: ${report.error}`)
    return
  }
  const { metrics } = report
  console.log(`✓ Completed ${report.fileName}`)
  console.log(`  ├─ Processing time: ${(metrics.processingTimeMs / 1000).toFixed(2)}s`)
  console.log(`  ├─ Pages processed: ${metrics.pagesProcessed}`)
  console.log(`  ├─ Headings found: ${metrics.headingsFound}`)
  console.log(`  ├─ Memory usage: ${metrics.memoryUsageMb}MB`)
  console.log(`  └─ Language: ${metrics.language}`)
}

function printSummary(summary: BatchSummary, outputDir: string, budgetMs: number): void {
  console.log(RULE)
  console.log('PROCESSING SUMMARY')
  console.log(RULE)
  console.log(`Total files processed: ${summary.total}`)
  console.log(`Successful: ${summary.successful}`)
  console.log(`Failed: ${summary.failed}`)
  console.log(`Total processing time: ${(summary.totalTimeMs / 1000).toFixed(2)} seconds`)
  console.log(`Average time per file: ${(summary.averageTimeMs / 1000).toFixed(2)} seconds`)
  if (summary.successful > 0) {
    console.log(`Success rate: ${summary.successRate.toFixed(1)}%`)
  }
  if (summary.total > 0) {
    const limit = (budgetMs / 1000).toFixed(0)
    console.log(
      summary.withinBudget
        ? `✅ Performance: Within ${limit}-second limit per file`
        : `⚠️  Performance: ${(summary.averageTimeMs / 1000).toFixed(2)}s per file (limit: ${limit}s)`,
    )
  }
  console.log(`\nOutput files saved to: ${outputDir}`)
}

const program = Effect.gen(function*() {
  const settings = yield* batchSettings
  const config = yield* loadOutlineConfig

  console.log(RULE)
  const summary = yield* runBatch({
    inputDir: settings.inputDir,
    outputDir: settings.outputDir,
    concurrency: settings.concurrency,
    timeout: Duration.millis(settings.timeoutMs),
    perFileBudgetMs: settings.timeoutMs,
    memoryLimitMb: settings.memoryLimitMb,
    config,
    onFileComplete: printReport,
  })

  printSummary(summary, settings.outputDir, settings.timeoutMs)
  return summary
})

const main = Effect.gen(function*() {
  const logLevel = yield* Config.logLevel('OUTLINE_LOG_LEVEL').pipe(
    Config.withDefault(LogLevel.Error),
  )
  return yield* program.pipe(Logger.withMinimumLogLevel(logLevel))
})

Effect.runPromise(main.pipe(Effect.provide(NodePdfLoaderLive)))
  .then(summary => {
    if (summary.failed > 0) process.exitCode = 1
  })
  .catch(error => {
    console.error('Outline extraction failed:', error)
    process.exitCode = 1
  })
