import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { CACHE_MANAGER } from '@nestjs/cache-manager';
import { ConversationService } from './conversation.service';
import { DEFAULT_RAG_CONFIG } from '../../../config/rag.config';

describe('ConversationService', () => {
  let service: ConversationService;
  let store: Map<string, unknown>;
  let cacheManager: {
    get: jest.Mock;
    set: jest.Mock;
    del: jest.Mock;
  };

  beforeEach(async () => {
    store = new Map();
    cacheManager = {
      get: jest.fn(async (key: string) => store.get(key)),
      set: jest.fn(async (key: string, value: unknown) => {
        store.set(key, value);
      }),
      del: jest.fn(async (key: string) => {
        store.delete(key);
      }),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ConversationService,
        { provide: CACHE_MANAGER, useValue: cacheManager },
        {
          provide: ConfigService,
          useValue: new ConfigService({
            rag: { ...DEFAULT_RAG_CONFIG, maxHistoryLength: 2 },
          }),
        },
      ],
    }).compile();

    service = module.get<ConversationService>(ConversationService);
  });

  describe('withSession', () => {
    it('should create an empty session on first use', async () => {
      const state = await service.withSession('s1', async (s) => s);

      expect(state.sessionId).toBe('s1');
      expect(state.history.length).toBe(0);
      expect(state.history.capacity).toBe(4);
    });

    it('should rehydrate valid turns from the cache snapshot', async () => {
      store.set('history:s1', [
        { role: 'user', content: 'What is the fee?' },
        { role: 'assistant', content: 'It is 1%.' },
        { role: 'system', content: 'ignored' },
        { role: 'user', content: 42 },
      ]);

      const turns = await service.withSession('s1', async (state) =>
        state.history.all(),
      );

      expect(turns).toEqual([
        { role: 'user', content: 'What is the fee?' },
        { role: 'assistant', content: 'It is 1%.' },
      ]);
    });

    it('should share one state between queued tasks of a session', async () => {
      cacheManager.set.mockRejectedValue(new Error('cache down'));

      const first = service.withSession('s1', async (state) => {
        state.history.appendExchange('q1', 'a1');
        await service.commit(state);
        return state;
      });
      const second = service.withSession('s1', async (state) => state);

      const [a, b] = await Promise.all([first, second]);
      expect(a).toBe(b);
      expect(b.history.length).toBe(2);
      expect(cacheManager.get).toHaveBeenCalledTimes(1);
    });

    it('should drop the session from memory once its queue drains', async () => {
      await service.withSession('s1', async (state) => {
        state.history.appendExchange('hello', 'Hi there!');
        await service.commit(state);
      });
      expect(await service.getHistory('s1')).toHaveLength(2);

      // snapshot TTL ran out
      store.clear();

      expect(await service.getHistory('s1')).toEqual([]);
      const state = await service.withSession('s1', async (s) => s);
      expect(state.history.length).toBe(0);
    });
  });

  describe('getHistory', () => {
    it('should read the snapshot without loading the session', async () => {
      store.set('history:s1', [{ role: 'user', content: 'hi' }]);

      await expect(service.getHistory('s1')).resolves.toEqual([
        { role: 'user', content: 'hi' },
      ]);
    });

    it('should start empty when the cache read fails', async () => {
      cacheManager.get.mockRejectedValueOnce(new Error('cache down'));

      await expect(service.getHistory('s1')).resolves.toEqual([]);
    });
  });

  describe('commit', () => {
    it('should write the turn log to the cache with a TTL', async () => {
      await service.withSession('s1', async (state) => {
        state.history.appendExchange('hello', 'Hi there!');
        await service.commit(state);
      });

      expect(cacheManager.set).toHaveBeenCalledWith(
        'history:s1',
        [
          { role: 'user', content: 'hello' },
          { role: 'assistant', content: 'Hi there!' },
        ],
        1800000,
      );
    });

    it('should not fail the cycle when the cache write fails', async () => {
      cacheManager.set.mockRejectedValueOnce(new Error('cache down'));

      await expect(
        service.withSession('s1', (state) => service.commit(state)),
      ).resolves.toBeUndefined();
    });
  });

  describe('reset', () => {
    it('should clear history and be idempotent', async () => {
      await service.withSession('s1', async (state) => {
        state.history.appendExchange('q', 'a');
        await service.commit(state);
      });

      await service.runExclusive('s1', () => service.reset('s1'));
      expect(await service.getHistory('s1')).toEqual([]);
      expect(store.has('history:s1')).toBe(false);

      await service.runExclusive('s1', () => service.reset('s1'));
      expect(await service.getHistory('s1')).toEqual([]);
      expect(cacheManager.del).toHaveBeenCalledTimes(2);
    });

    it('should clear the in-memory state of a running session', async () => {
      const turns = await service.withSession('s1', async (state) => {
        state.history.appendExchange('q', 'a');
        await service.reset('s1');
        return state.history.length;
      });

      expect(turns).toBe(0);
    });

    it('should accept an unknown session', async () => {
      await expect(service.reset('never-seen')).resolves.toBeUndefined();
    });
  });

  describe('runExclusive', () => {
    it('should run tasks of one session in submission order', async () => {
      const events: string[] = [];
      let release: () => void = () => undefined;
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });

      const first = service.runExclusive('s1', async () => {
        events.push('first:start');
        await gate;
        events.push('first:end');
        return 1;
      });
      const second = service.runExclusive('s1', async () => {
        events.push('second');
        return 2;
      });

      await Promise.resolve();
      expect(events).toEqual(['first:start']);

      release();
      await expect(Promise.all([first, second])).resolves.toEqual([1, 2]);
      expect(events).toEqual(['first:start', 'first:end', 'second']);
    });

    it('should keep the queue moving after a failed task', async () => {
      const failed = service.runExclusive('s1', async () => {
        throw new Error('boom');
      });
      const next = service.runExclusive('s1', async () => 'ok');

      await expect(failed).rejects.toThrow('boom');
      await expect(next).resolves.toBe('ok');
    });

    it('should not make other sessions wait', async () => {
      let release: () => void = () => undefined;
      const blocked = service.runExclusive(
        's1',
        () =>
          new Promise<void>((resolve) => {
            release = resolve;
          }),
      );

      await expect(
        service.runExclusive('s2', async () => 'independent'),
      ).resolves.toBe('independent');

      release();
      await blocked;
    });
  });

  it('should generate prefixed session ids', () => {
    expect(service.generateSessionId()).toMatch(/^session_\d+_[a-z0-9]+$/);
  });
});
