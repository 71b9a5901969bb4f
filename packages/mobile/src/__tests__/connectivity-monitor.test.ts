import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { noopLogger, type Logger } from '@kinesync/core';
import { createConnectivitySimulator, type ConnectivitySimulator } from '@kinesync/testing';
import {
  ConnectivityMonitor,
  createConnectivityMonitor,
  isOnlineTransportSet,
} from '../connectivity-monitor.js';

describe('isOnlineTransportSet', () => {
  it('counts wifi, cellular, ethernet and vpn as online', () => {
    expect(isOnlineTransportSet(['wifi'])).toBe(true);
    expect(isOnlineTransportSet(['cellular'])).toBe(true);
    expect(isOnlineTransportSet(['ethernet'])).toBe(true);
    expect(isOnlineTransportSet(['bluetooth', 'vpn'])).toBe(true);
  });

  it('treats other transports and empty sets as offline', () => {
    expect(isOnlineTransportSet(['none'])).toBe(false);
    expect(isOnlineTransportSet(['bluetooth', 'other'])).toBe(false);
    expect(isOnlineTransportSet([])).toBe(false);
  });
});

describe('ConnectivityMonitor', () => {
  let source: ConnectivitySimulator;
  let monitor: ConnectivityMonitor;
  let emitted: boolean[];

  beforeEach(() => {
    source = createConnectivitySimulator();
    monitor = createConnectivityMonitor({ source, logger: noopLogger });
    emitted = [];
    monitor.online$.subscribe((online) => emitted.push(online));
  });

  afterEach(() => {
    monitor.dispose();
  });

  it('is online before initialization', () => {
    expect(monitor.isOnline).toBe(true);
  });

  describe('initialize', () => {
    it('reads the current state without emitting', async () => {
      source = createConnectivitySimulator({ initialTransports: ['none'] });
      monitor = createConnectivityMonitor({ source, logger: noopLogger });
      monitor.online$.subscribe((online) => emitted.push(online));

      await monitor.initialize();

      expect(monitor.isOnline).toBe(false);
      expect(emitted).toEqual([]);
    });

    it('assumes online when the first check fails', async () => {
      source = createConnectivitySimulator({ initialTransports: ['none'] });
      source.failNextCheck();
      monitor = createConnectivityMonitor({ source, logger: noopLogger });

      await monitor.initialize();

      expect(monitor.isOnline).toBe(true);
    });

    it('only checks once when called repeatedly', async () => {
      await Promise.all([monitor.initialize(), monitor.initialize()]);
      await monitor.initialize();

      expect(source.getCheckCount()).toBe(1);
    });
  });

  describe('online$', () => {
    beforeEach(async () => {
      await monitor.initialize();
    });

    it('emits only when the online state flips', () => {
      source.goOnline('cellular');
      source.goOffline();
      source.goOffline();
      source.setTransports(['bluetooth']);
      source.goOnline('wifi');
      source.setTransports(['wifi', 'vpn']);

      expect(emitted).toEqual([false, true]);
      expect(monitor.isOnline).toBe(true);
    });

    it('keeps the last state when the platform stream fails', async () => {
      const warn = vi.fn();
      const logger: Logger = { ...noopLogger, warn };
      monitor.dispose();
      monitor = createConnectivityMonitor({ source, logger });
      await monitor.initialize();

      source.failStream();

      expect(monitor.isOnline).toBe(true);
      expect(warn).toHaveBeenCalledWith('Connectivity stream failed, keeping last state', {
        isOnline: true,
        error: 'Simulated connectivity stream failure',
      });
    });
  });

  describe('checkConnectivity', () => {
    it('re-reads the platform state and emits on change', async () => {
      source.setTransports(['none']);

      expect(await monitor.checkConnectivity()).toBe(false);
      expect(emitted).toEqual([false]);
    });

    it('returns the last known state when the check fails', async () => {
      source.failNextCheck();

      expect(await monitor.checkConnectivity()).toBe(true);
      expect(emitted).toEqual([]);
    });
  });

  describe('dispose', () => {
    it('completes online$ and stops following the platform', async () => {
      await monitor.initialize();
      let completed = false;
      monitor.online$.subscribe({ complete: () => (completed = true) });

      monitor.dispose();
      source.goOffline();

      expect(completed).toBe(true);
      expect(monitor.isOnline).toBe(true);
      expect(emitted).toEqual([]);
    });
  });
});
