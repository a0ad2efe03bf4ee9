/**
 * Unit tests for configuration resolution
 *
 * Precedence is CLI flag > environment > default for every setting.
 *
 * @module tests/unit/config-resolver
 */

import { describe, it, expect } from 'vitest'
import os from 'node:os'
import path from 'node:path'
import {
  parseRegion,
  resolveCapture,
  resolveDelivery,
  resolveDriver,
  resolveLocations,
  resolvePath,
  type ResolveContext,
} from '../../lib/config/config-resolver.js'
import { ConfigurationError } from '../../error.js'

const context = (env: NodeJS.ProcessEnv = {}): ResolveContext => ({ env, cwd: '/work' })

describe('Configuration Resolver', () => {
  // ==========================================================================
  // resolveCapture
  // ==========================================================================

  describe('resolveCapture', () => {
    it('falls back to defaults', () => {
      expect(resolveCapture({}, context())).toEqual({
        outDir: '/work',
        display: 1,
        region: undefined,
        filenamePrefix: 'shot_',
        delivery: { kind: 'none' },
      })
    })

    it('reads the environment when flags are absent', () => {
      const config = resolveCapture(
        {},
        context({
          SHOTLOOP_OUT_DIR: 'caps',
          SHOTLOOP_DISPLAY: '2',
          SHOTLOOP_REGION: '1,2,3,4',
          SHOTLOOP_FILENAME_PREFIX: 'desk_',
        })
      )

      expect(config.outDir).toBe('/work/caps')
      expect(config.display).toBe(2)
      expect(config.region).toEqual({ left: 1, top: 2, width: 3, height: 4 })
      expect(config.filenamePrefix).toBe('desk_')
    })

    it('prefers flags over the environment', () => {
      const config = resolveCapture(
        { dir: '/abs/out', display: '0', region: ['10', '11', '12', '13'] },
        context({ SHOTLOOP_OUT_DIR: 'caps', SHOTLOOP_DISPLAY: '2', SHOTLOOP_REGION: '1 2 3 4' })
      )

      expect(config.outDir).toBe('/abs/out')
      expect(config.display).toBe(0)
      expect(config.region).toEqual({ left: 10, top: 11, width: 12, height: 13 })
    })

    it('treats blank environment values as unset', () => {
      expect(resolveCapture({}, context({ SHOTLOOP_OUT_DIR: '   ' })).outDir).toBe('/work')
    })

    it('rejects a negative display', () => {
      expect(() => resolveCapture({ display: '-1' }, context())).toThrow('display: must be >= 0 (got -1)')
    })

    it('rejects a non-numeric display from the environment', () => {
      expect(() => resolveCapture({}, context({ SHOTLOOP_DISPLAY: 'left' }))).toThrow(
        'SHOTLOOP_DISPLAY: must be an integer (got "left")'
      )
    })
  })

  // ==========================================================================
  // parseRegion
  // ==========================================================================

  describe('parseRegion', () => {
    it('accepts spaces or commas', () => {
      expect(parseRegion('10 20 300 200')).toEqual({ left: 10, top: 20, width: 300, height: 200 })
      expect(parseRegion('-1920,0,1920,1080')).toEqual({ left: -1920, top: 0, width: 1920, height: 1080 })
    })

    it('returns undefined for blank input', () => {
      expect(parseRegion('  ')).toBeUndefined()
    })

    it.each(['1 2 3', '1 2 3 4 5', '1 2 w 4', '1.5 2 3 4'])('rejects %j', (value) => {
      expect(() => parseRegion(value, 'region')).toThrow(ConfigurationError)
    })

    it('rejects an empty rectangle', () => {
      expect(() => parseRegion('1 2 0 4', 'region')).toThrow('region: width and height must be > 0')
    })
  })

  // ==========================================================================
  // resolveDelivery
  // ==========================================================================

  describe('resolveDelivery', () => {
    it('builds a git sink with defaults', () => {
      expect(resolveDelivery({ send: 'git' }, context())).toEqual({
        kind: 'git',
        repoDir: '/work',
        remote: 'origin',
        branch: 'main',
        push: true,
        pushEvery: 1,
      })
    })

    it('honours git flags and environment', () => {
      expect(
        resolveDelivery(
          { send: 'git', gitRepo: 'repo', gitPush: false },
          context({ SHOTLOOP_GIT_BRANCH: 'captures', SHOTLOOP_GIT_PUSH_EVERY: '5' })
        )
      ).toEqual({
        kind: 'git',
        repoDir: '/work/repo',
        remote: 'origin',
        branch: 'captures',
        push: false,
        pushEvery: 5,
      })
    })

    it('builds an http sink from the environment', () => {
      expect(
        resolveDelivery(
          { httpHeader: ['Authorization: Bearer test-secret'], httpMethod: 'put' },
          context({ SHOTLOOP_SEND: 'HTTP', SHOTLOOP_HTTP_URL: 'http://upload.test/in' })
        )
      ).toEqual({
        kind: 'http',
        url: 'http://upload.test/in',
        headers: ['Authorization: Bearer test-secret'],
        method: 'PUT',
        fieldName: 'file',
      })
    })

    it('requires a URL for http', () => {
      expect(() => resolveDelivery({ send: 'http' }, context())).toThrow(
        'send: --http-url is required with --send http'
      )
    })

    it('rejects malformed headers', () => {
      expect(() =>
        resolveDelivery({ send: 'http', httpUrl: 'http://upload.test', httpHeader: ['broken'] }, context())
      ).toThrow(ConfigurationError)
    })

    it('rejects sink options for another mode', () => {
      expect(() => resolveDelivery({ gitRemote: 'backup' }, context())).toThrow(
        'send: git options need --send git (send mode is "none")'
      )
      expect(() => resolveDelivery({ send: 'git', httpUrl: 'http://upload.test' }, context())).toThrow(
        'send: http options need --send http (send mode is "git")'
      )
    })

    it('rejects unknown modes', () => {
      expect(() => resolveDelivery({ send: 'ftp' }, context())).toThrow(
        'send: must be one of none, git, http (got "ftp")'
      )
    })

    it('rejects a zero push batch', () => {
      expect(() => resolveDelivery({ send: 'git', gitPushEvery: '0' }, context())).toThrow(
        'git push every: must be >= 1 (got 0)'
      )
    })
  })

  // ==========================================================================
  // resolveDriver / resolveLocations
  // ==========================================================================

  describe('resolveDriver', () => {
    it('derives pidfile and checkpoint log from the output directory', () => {
      const config = resolveDriver({ dir: 'out' }, context())

      expect(config.intervalSeconds).toBe(5)
      expect(config.pidfile).toBe('/work/out/shotloop.pid')
      expect(config.checkpointCsv).toBe('/work/out/shotloop_checkpoints.csv')
      expect(config.maxShots).toBeUndefined()
      expect(config.keep).toBeUndefined()
    })

    it('parses interval, limits and explicit paths', () => {
      const config = resolveDriver(
        { interval: '1m', maxShots: '3', keep: '10', pidfile: 'run/d.pid', checkpointCsv: '/logs/c.csv' },
        context()
      )

      expect(config.intervalSeconds).toBe(60)
      expect(config.maxShots).toBe(3)
      expect(config.keep).toBe(10)
      expect(config.pidfile).toBe('/work/run/d.pid')
      expect(config.checkpointCsv).toBe('/logs/c.csv')
    })

    it('reports bad intervals against the flag', () => {
      expect(() => resolveDriver({ interval: 'soon' }, context())).toThrow(
        'interval: Invalid duration "soon": expected like 10, 10s, 1m, 2h, 1d'
      )
    })

    it('reports bad intervals against the environment variable', () => {
      expect(() => resolveDriver({}, context({ SHOTLOOP_INTERVAL: '0' }))).toThrow(
        'SHOTLOOP_INTERVAL: Invalid duration "0": duration must be > 0'
      )
    })

    it('rejects a zero capture limit', () => {
      expect(() => resolveDriver({ maxShots: '0' }, context())).toThrow('max shots: must be >= 1 (got 0)')
    })
  })

  describe('resolveLocations', () => {
    it('uses the environment pidfile when no flag is given', () => {
      expect(resolveLocations({}, context({ SHOTLOOP_PIDFILE: '/run/shotloop.pid' }))).toEqual({
        outDir: '/work',
        pidfile: '/run/shotloop.pid',
        checkpointCsv: '/work/shotloop_checkpoints.csv',
      })
    })

    it('prefers the checkpoint flag over the environment', () => {
      const locations = resolveLocations(
        { dir: 'out', checkpointCsv: 'logs/run.csv' },
        context({ SHOTLOOP_CHECKPOINT_CSV: '/var/log/shotloop.csv' })
      )

      expect(locations.checkpointCsv).toBe('/work/logs/run.csv')
      expect(locations.pidfile).toBe('/work/out/shotloop.pid')
    })
  })

  describe('resolvePath', () => {
    it('expands the home directory', () => {
      expect(resolvePath('~/caps', '/work')).toBe(path.join(os.homedir(), 'caps'))
    })
  })
})
