import fs from 'node:fs/promises'
import { parse } from 'csv-parse/sync'
import appRoot from 'app-root-path'
import path from 'node:path'
import { ConfigError } from './causal/errors'
import { BaselineDataSchema, formatIssues } from './causal/schema'
import { BaselineData, BaselineIndicator } from './causal/types'
import { createLogger } from './logger'

const log = createLogger('csv')

const REQUIRED_COLUMNS = ['indicator', 'value', 'unit', 'source', 'timestamp', 'confidence']

function numericCell(row: Record<string, string>, column: string, line: number): number {
  const raw = row[column]
  const value = Number(raw)
  if (raw === '' || !Number.isFinite(value)) {
    throw new ConfigError(`baseline CSV row ${line}: ${column} "${raw}" is not a number`, { line, column })
  }
  return value
}

export function parseBaselineCsv(text: string, metadata: Record<string, string> = {}): BaselineData {
  const records: Record<string, string>[] = parse(text, {
    columns: true,
    skip_empty_lines: true,
    trim: true
  }) as Record<string, string>[]

  const columns = records.length > 0 ? Object.keys(records[0]) : []
  const missing = REQUIRED_COLUMNS.filter((c) => !columns.includes(c))
  if (records.length > 0 && missing.length > 0) {
    throw new ConfigError(`baseline CSV is missing columns: ${missing.join(', ')}`)
  }

  const indicators: Record<string, BaselineIndicator> = {}
  for (const [i, row] of records.entries()) {
    const line = i + 2 // header is line 1
    if (indicators[row.indicator]) log.warn(`duplicate indicator "${row.indicator}" on row ${line}, keeping last`)
    indicators[row.indicator] = {
      value: numericCell(row, 'value', line),
      unit: row.unit,
      source: row.source,
      timestamp: row.timestamp,
      confidence: numericCell(row, 'confidence', line)
    }
  }

  const parsed = BaselineDataSchema.safeParse({ indicators, metadata })
  if (!parsed.success) throw new ConfigError(`invalid baseline CSV: ${formatIssues(parsed.error)}`)
  log.debug(`parsed ${records.length} baseline indicators`)
  return parsed.data
}

const root = appRoot.path

export async function loadBaselineFromFile(filePath: string): Promise<BaselineData> {
  const absPath = path.resolve(root, filePath)
  const text = await fs.readFile(absPath, 'utf-8')
  return parseBaselineCsv(text, { file: path.relative(root, absPath) })
}
