/**
 * logger.test.ts
 * Tests for logger utility
 */

import { mkdtempSync, readFileSync, readdirSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

import { logger } from '../../src/utils/logger.js';

describe('Logger', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.stubEnv('LOG_LEVEL', 'info');
    logger.clearLogs();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('console output', () => {
    it('writes info to console.log with a level prefix', () => {
      logger.info('Server started');

      expect(console.log).toHaveBeenCalledWith(expect.stringContaining('INFO: Server started'));
    });

    it('passes meta as a second argument', () => {
      const meta = { serverId: 'p1:8000' };
      logger.warn('Probe failed', meta);

      expect(console.warn).toHaveBeenCalledWith(expect.stringContaining('WARN: Probe failed'), meta);
    });

    it('writes errors to console.error', () => {
      logger.error('Boom');

      expect(console.error).toHaveBeenCalledWith(expect.stringContaining('ERROR: Boom'));
    });
  });

  describe('levels', () => {
    it('drops messages below LOG_LEVEL', () => {
      vi.stubEnv('LOG_LEVEL', 'warn');

      logger.info('hidden');

      expect(console.log).not.toHaveBeenCalled();
      expect(logger.getLogs()).toHaveLength(0);
    });

    it('always keeps errors', () => {
      vi.stubEnv('LOG_LEVEL', 'error');

      logger.error('visible');

      expect(logger.getLogs()).toHaveLength(1);
    });

    it('logs debug when DEBUG=true regardless of level', () => {
      vi.stubEnv('DEBUG', 'true');

      logger.debug('Debug message');

      expect(logger.getLogs()[0]).toMatchObject({ level: 'debug', message: 'Debug message' });
    });

    it('uses setLevel when LOG_LEVEL is not set', () => {
      vi.stubEnv('LOG_LEVEL', '');
      logger.setLevel('debug');

      logger.debug('now visible');

      expect(logger.getLevel()).toBe('debug');
      expect(logger.getLogs()).toHaveLength(1);
      logger.setLevel('info');
    });

    it('lets LOG_LEVEL win over setLevel', () => {
      vi.stubEnv('LOG_LEVEL', 'warn');
      logger.setLevel('debug');

      expect(logger.getLevel()).toBe('warn');
      logger.setLevel('info');
    });

    it('lets setLevel win over LOG_LEVEL when asked to', () => {
      vi.stubEnv('LOG_LEVEL', 'debug');
      logger.setLevel('error', { overrideEnv: true });

      logger.warn('hidden');
      logger.error('shown');

      expect(logger.getLevel()).toBe('error');
      expect(logger.getLogs().map(entry => entry.message)).toEqual(['shown']);
      logger.setLevel('info');
    });
  });

  describe('buffer', () => {
    it('stores entries with timestamp and meta', () => {
      logger.info('first', { n: 1 });

      const [entry] = logger.getLogs();
      expect(entry).toMatchObject({ level: 'info', message: 'first', meta: { n: 1 } });
      expect(entry?.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T/);
    });

    it('returns the most recent entries when limited', () => {
      logger.info('one');
      logger.info('two');
      logger.info('three');

      expect(logger.getLogs(2).map(e => e.message)).toEqual(['two', 'three']);
    });

    it('clears the buffer', () => {
      logger.info('one');
      logger.clearLogs();

      expect(logger.getLogs()).toEqual([]);
    });
  });

  describe('file output', () => {
    it('appends JSON lines to a daily file when enabled', () => {
      const dir = mkdtempSync(path.join(tmpdir(), 'orchestrator-logs-'));
      vi.stubEnv('DISABLE_FILE_LOGGING', 'false');
      vi.stubEnv('LOG_DIR', dir);

      try {
        logger.info('to disk', { ok: true });

        const files = readdirSync(dir);
        expect(files).toHaveLength(1);
        expect(files[0]).toMatch(/^orchestrator-\d{4}-\d{2}-\d{2}\.log$/);

        const line = readFileSync(path.join(dir, files[0] ?? ''), 'utf-8').trim();
        expect(JSON.parse(line)).toMatchObject({ level: 'info', message: 'to disk', meta: { ok: true } });
      } finally {
        rmSync(dir, { recursive: true, force: true });
      }
    });
  });
});
