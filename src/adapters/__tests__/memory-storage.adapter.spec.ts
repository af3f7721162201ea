import { Logger } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { MemoryStorageAdapter } from '../memory-storage.adapter';
import { TOKEN_BUCKET_CLOCK } from '../../utils/constants';
import { ManualClock } from '../../__tests__/helpers/manual-clock';

describe('MemoryStorageAdapter', () => {
  let adapter: MemoryStorageAdapter;
  let clock: ManualClock;

  beforeEach(async () => {
    clock = new ManualClock();

    const moduleRef = await Test.createTestingModule({
      providers: [
        MemoryStorageAdapter,
        { provide: TOKEN_BUCKET_CLOCK, useValue: clock },
      ],
    }).compile();

    adapter = moduleRef.get<MemoryStorageAdapter>(MemoryStorageAdapter);
  });

  describe('getTokenCount', () => {
    it('should return 0 for a key that was never replenished', () => {
      expect(adapter.getTokenCount('unknown')).toBe(0);
      expect(adapter.size).toBe(0);
    });

    it('should not replenish the bucket', () => {
      adapter.replenish('key', 10, 10);
      adapter.consume('key', 4);
      clock.tick(5);

      expect(adapter.getTokenCount('key')).toBe(6);
      expect(adapter.getTokenCount('key')).toBe(6);
    });
  });

  describe('replenish', () => {
    it('should create a full bucket the first time a key is seen', () => {
      adapter.replenish('key', 2, 10);

      expect(adapter.getTokenCount('key')).toBe(10);
      expect(adapter.size).toBe(1);
    });

    it('should add rate * elapsed seconds to the bucket', () => {
      adapter.replenish('key', 2, 10);
      adapter.consume('key', 7);

      clock.tick(1.5);
      adapter.replenish('key', 2, 10);

      expect(adapter.getTokenCount('key')).toBe(6);
    });

    it('should cap the bucket at capacity', () => {
      adapter.replenish('key', 2, 10);
      adapter.consume('key', 7);

      clock.tick(100);
      adapter.replenish('key', 2, 10);

      expect(adapter.getTokenCount('key')).toBe(10);
    });

    it('should keep fractional tokens between calls', () => {
      adapter.replenish('key', 0.5, 5);
      adapter.consume('key', 5);

      clock.tick(1);
      adapter.replenish('key', 0.5, 5);
      expect(adapter.getTokenCount('key')).toBe(0.5);
      expect(adapter.consume('key', 1)).toBe(false);
      expect(adapter.getTokenCount('key')).toBe(0.5);

      clock.tick(1);
      adapter.replenish('key', 0.5, 5);
      expect(adapter.consume('key', 1)).toBe(true);
      expect(adapter.getTokenCount('key')).toBe(0);
    });

    it('should skip the update when the clock reading is older than the bucket', () => {
      const debug = jest
        .spyOn(Logger.prototype, 'debug')
        .mockImplementation(() => undefined);
      adapter.replenish('key', 1, 10);
      adapter.consume('key', 4);

      clock.set(999);
      adapter.replenish('key', 1, 10);
      expect(adapter.getTokenCount('key')).toBe(6);
      expect(debug).toHaveBeenCalledTimes(1);
      debug.mockRestore();

      // Timestamp stayed at 1000, so one second has elapsed, not two
      clock.set(1001);
      adapter.replenish('key', 1, 10);
      expect(adapter.getTokenCount('key')).toBe(7);
    });
  });

  describe('consume', () => {
    it('should remove exactly the requested tokens when available', () => {
      adapter.replenish('key', 1, 10);

      expect(adapter.consume('key', 3)).toBe(true);
      expect(adapter.getTokenCount('key')).toBe(7);
    });

    it('should remove nothing when fewer tokens are available', () => {
      adapter.replenish('key', 1, 10);
      adapter.consume('key', 7);

      expect(adapter.consume('key', 4)).toBe(false);
      expect(adapter.getTokenCount('key')).toBe(3);

      expect(adapter.consume('key', 3)).toBe(true);
      expect(adapter.getTokenCount('key')).toBe(0);
    });

    it('should return false for a key that was never replenished', () => {
      expect(adapter.consume('missing', 1)).toBe(false);
      expect(adapter.getTokenCount('missing')).toBe(0);
      expect(adapter.size).toBe(0);
    });
  });

  describe('keys', () => {
    it('should keep string keys and byte keys apart', () => {
      adapter.replenish('x', 1, 5);
      adapter.consume('x', 5);

      const bytes = Uint8Array.from([0x78]);
      expect(adapter.getTokenCount(bytes)).toBe(0);

      adapter.replenish(bytes, 1, 5);
      expect(adapter.getTokenCount(bytes)).toBe(5);
      expect(adapter.getTokenCount('x')).toBe(0);
    });

    it('should compare byte keys by content', () => {
      adapter.replenish(new Uint8Array([1, 2, 3]), 1, 5);
      adapter.consume(new Uint8Array([1, 2, 3]), 2);

      expect(adapter.getTokenCount(new Uint8Array([1, 2, 3]))).toBe(3);
      expect(
        adapter.getTokenCount(new Uint8Array([9, 1, 2, 3]).subarray(1)),
      ).toBe(3);
    });

    it('should hold one bucket per distinct key', () => {
      adapter.replenish('a', 1, 1);
      adapter.replenish('b', 1, 1);
      adapter.replenish(new Uint8Array([0x61]), 1, 1);
      adapter.replenish('a', 1, 1);

      expect(adapter.size).toBe(3);
    });
  });

  it('should fall back to the monotonic clock when none is provided', async () => {
    const moduleRef = await Test.createTestingModule({
      providers: [MemoryStorageAdapter],
    }).compile();
    const defaultAdapter =
      moduleRef.get<MemoryStorageAdapter>(MemoryStorageAdapter);

    defaultAdapter.replenish('key', 1, 3);
    defaultAdapter.replenish('key', 1, 3);

    expect(defaultAdapter.getTokenCount('key')).toBe(3);
  });
});
