/**
 * Domain types shared across the capture, delivery and driver modules
 * @module types/domain
 */

// =============================================================================
// GEOMETRY
// =============================================================================

/** Absolute screen rectangle in virtual-desktop coordinates */
export interface Rect {
  left: number
  top: number
  width: number
  height: number
}

// =============================================================================
// DELIVERY
// =============================================================================

export interface GitDeliveryConfig {
  kind: 'git'
  repoDir: string
  remote: string
  branch: string
  push: boolean
  /** Push on captures 1, N+1, 2N+1, ...; commit only otherwise */
  pushEvery: number
}

export interface HttpDeliveryConfig {
  kind: 'http'
  url: string
  /** Ordered "Name: Value" header lines */
  headers: string[]
  method: string
  fieldName: string
}

export interface NoDeliveryConfig {
  kind: 'none'
}

export type DeliveryConfig = NoDeliveryConfig | GitDeliveryConfig | HttpDeliveryConfig

export type SendMode = DeliveryConfig['kind']

// =============================================================================
// CONFIGURATION
// =============================================================================

/** Settings shared by one-shot capture and the driver */
export interface ResolvedCaptureConfig {
  outDir: string
  display: number
  region?: Rect
  filenamePrefix: string
  delivery: DeliveryConfig
}

export interface ResolvedDriverConfig extends ResolvedCaptureConfig {
  intervalSeconds: number
  pidfile: string
  checkpointCsv: string
  maxShots?: number
  /** Retain at most this many captures in outDir */
  keep?: number
}

// =============================================================================
// PROCESS STATE
// =============================================================================

export interface DriverStatus {
  pidfile: string
  pid?: number
  running: boolean
  stalePidfile: boolean
}

export type DriverState = 'idle' | 'starting' | 'running' | 'stopping' | 'stopped'

// =============================================================================
// CHECKPOINTS
// =============================================================================

export type CheckpointEvent = 'start' | 'capture' | 'stop'

export interface CheckpointRecord {
  event: CheckpointEvent
  tsUtc: string
  count: number
  filename: string
  outDir: string
  intervalSeconds: number
  display: number
  region?: Rect
  send: SendMode
  sessionId: string
}
