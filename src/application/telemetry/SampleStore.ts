/**
 * Sample Store
 *
 * Turns raw vendor timeseries entries into a well-formed Series:
 * - entries without a start epoch are dropped
 * - unparseable values become null (no data), never zero
 * - one sample per epoch, the later entry wins
 * - ascending by epoch
 * - gap-split: a present reading that follows the previous present reading
 *   by more than the gap threshold is nulled, its row kept
 */

import type { PresentSample, RawEntry, Sample, Series } from "../../domain/telemetry/Telemetry"
import { DEFAULT_THRESHOLDS } from "../../shared/config"
import { DEFAULT_TIME_ZONE, toZonedIso } from "../../shared/time/zone"

export interface IngestOptions {
  gapThresholdSeconds?: number
  timeZone?: string
}

export function parseEpoch(raw: RawEntry["start"]): number | null {
  if (raw === null || raw === undefined) {
    return null
  }
  const epoch = typeof raw === "number" ? raw : Number(raw.trim() || NaN)
  if (!Number.isFinite(epoch) || epoch <= 0) {
    return null
  }
  return Math.floor(epoch)
}

export function parsePowerValue(raw: unknown): number | null {
  if (typeof raw === "number") {
    return Number.isFinite(raw) ? raw : null
  }
  if (typeof raw === "string") {
    const trimmed = raw.trim()
    if (!trimmed) {
      return null
    }
    const parsed = Number(trimmed)
    return Number.isFinite(parsed) ? parsed : null
  }
  return null
}

export function ingest(rawEntries: readonly RawEntry[], options: IngestOptions = {}): Series {
  const gapThreshold = options.gapThresholdSeconds ?? DEFAULT_THRESHOLDS.gapThresholdSeconds
  const timeZone = options.timeZone ?? DEFAULT_TIME_ZONE

  const byEpoch = new Map<number, Sample>()
  for (const entry of rawEntries) {
    const epoch = parseEpoch(entry.start)
    if (epoch === null) {
      continue
    }
    // Re-fetched slots replace earlier ones
    byEpoch.set(epoch, {
      epoch,
      timestamp: toZonedIso(epoch, timeZone),
      value: parsePowerValue(entry.value),
      units: entry.units ?? "",
    })
  }

  const samples = [...byEpoch.values()].sort((a, b) => a.epoch - b.epoch)

  let previousPresentEpoch: number | null = null
  for (const sample of samples) {
    if (sample.value === null) {
      continue
    }
    const epoch = sample.epoch
    if (previousPresentEpoch !== null && epoch - previousPresentEpoch > gapThreshold) {
      sample.value = null
    }
    previousPresentEpoch = epoch
  }

  return samples
}

export function isPresent(sample: Sample): sample is PresentSample {
  return sample.value !== null
}

export function presentSamples(series: Series): PresentSample[] {
  return series.filter(isPresent)
}

export function lastPresent(series: Series): PresentSample | null {
  for (let i = series.length - 1; i >= 0; i--) {
    const sample = series[i]
    if (isPresent(sample)) {
      return sample
    }
  }
  return null
}

export function hasData(series: Series): boolean {
  return series.some(isPresent)
}
