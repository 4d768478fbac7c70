/**
 * Detection Log
 *
 * Keeps the most recent pipeline outcomes per device, with per-device stats
 * and JSON export. Printed on shutdown. Stats cover the retained entries.
 */

import type { PipelineOutcome } from './types'

export type DetectionLogEntry = {
  deviceId: string
  deviceName: string
  eventId: string
  outcome: PipelineOutcome
  timestamp: number
  durationMs?: number
  description?: string
  filename?: string
}

export type DeviceDetectionStats = {
  total: number
  byOutcome: Record<PipelineOutcome, number>
  firstTimestamp: number
  lastTimestamp: number
  lastOutcome: PipelineOutcome
}

export const MAX_ENTRIES_PER_DEVICE = 500

const deviceLogs: Map<string, DetectionLogEntry[]> = new Map()

const emptyCounts = (): Record<PipelineOutcome, number> => ({
  gated: 0,
  capture_failed: 0,
  classification_failed: 0,
  suspicious: 0,
  delivery: 0,
  clear: 0,
})

export const recordDetection = (entry: DetectionLogEntry): void => {
  const logs = deviceLogs.get(entry.deviceId)
  if (logs) {
    logs.push(entry)
    if (logs.length > MAX_ENTRIES_PER_DEVICE) {
      logs.splice(0, logs.length - MAX_ENTRIES_PER_DEVICE)
    }
  } else {
    deviceLogs.set(entry.deviceId, [entry])
  }

  console.log(`[DetectionLog] ${entry.deviceName} event ${entry.eventId}: ${entry.outcome.toUpperCase()}`, {
    ...(entry.durationMs !== undefined && { durationMs: entry.durationMs }),
    ...(entry.filename && { filename: entry.filename }),
  })
}

export const getDeviceDetections = (deviceId: string): DetectionLogEntry[] => {
  return deviceLogs.get(deviceId) ?? []
}

export const getDetectionStats = (deviceId: string): DeviceDetectionStats | null => {
  const logs = deviceLogs.get(deviceId)
  if (!logs || logs.length === 0) {
    return null
  }

  const byOutcome = emptyCounts()
  for (const entry of logs) {
    byOutcome[entry.outcome] += 1
  }

  const last = logs[logs.length - 1]
  return {
    total: logs.length,
    byOutcome,
    firstTimestamp: logs[0].timestamp,
    lastTimestamp: last.timestamp,
    lastOutcome: last.outcome,
  }
}

export const exportDetections = (exportedAt: number = Date.now()): string => {
  const devices = [...deviceLogs.entries()].map(([deviceId, logs]) => ({
    deviceId,
    stats: getDetectionStats(deviceId),
    logs,
  }))

  return JSON.stringify({
    exportedAt: new Date(exportedAt).toISOString(),
    devices,
  }, null, 2)
}

export const clearDetections = (): void => {
  deviceLogs.clear()
}
