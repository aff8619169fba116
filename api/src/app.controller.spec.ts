import { Test, TestingModule } from '@nestjs/testing';
import { HealthCheckSchema } from '@presence-board/contract';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { DiscordBotClientService } from './discord-bot/discord-bot-client.service';
import { DrizzleAsyncProvider } from './drizzle/drizzle.module';

const mockDb = {
  execute: jest.fn().mockResolvedValue([{ '1': 1 }]),
};

const mockDiscordClient = {
  isConnected: jest.fn().mockReturnValue(true),
  isConnecting: jest.fn().mockReturnValue(false),
};

describe('AppController', () => {
  let appController: AppController;

  beforeEach(async () => {
    const app: TestingModule = await Test.createTestingModule({
      controllers: [AppController],
      providers: [
        AppService,
        { provide: DrizzleAsyncProvider, useValue: mockDb },
        { provide: DiscordBotClientService, useValue: mockDiscordClient },
      ],
    }).compile();

    appController = app.get<AppController>(AppController);
  });

  function mockResponse() {
    return {
      status: jest.fn().mockReturnThis(),
      json: jest.fn(),
    };
  }

  function bodyOf(res: ReturnType<typeof mockResponse>) {
    return res.json.mock.calls[0][0] as {
      status: string;
      timestamp: string;
      db: { connected: boolean; latencyMs: number };
      discord: { connected: boolean; connecting: boolean };
    };
  }

  describe('health', () => {
    it('returns ok when the database answers', async () => {
      const res = mockResponse();

      await appController.getHealth(
        res as unknown as import('express').Response,
      );

      expect(res.status).toHaveBeenCalledWith(200);
      const body = bodyOf(res);
      expect(body.status).toBe('ok');
      expect(body.db.connected).toBe(true);
      expect(body.db.latencyMs).toBeGreaterThanOrEqual(0);
      expect(body.discord).toEqual({ connected: true, connecting: false });
      expect(HealthCheckSchema.safeParse(body).success).toBe(true);
      expect(new Date(body.timestamp).toISOString()).toBe(body.timestamp);
    });

    it('returns 503 when the database is down', async () => {
      mockDb.execute.mockRejectedValueOnce(new Error('DB connection refused'));
      const res = mockResponse();

      await appController.getHealth(
        res as unknown as import('express').Response,
      );

      expect(res.status).toHaveBeenCalledWith(503);
      expect(bodyOf(res).status).toBe('unhealthy');
      expect(bodyOf(res).db.connected).toBe(false);
    });

    it('stays ok while the bot is offline', async () => {
      mockDiscordClient.isConnected.mockReturnValueOnce(false);
      const res = mockResponse();

      await appController.getHealth(
        res as unknown as import('express').Response,
      );

      expect(res.status).toHaveBeenCalledWith(200);
      expect(bodyOf(res).discord).toEqual({
        connected: false,
        connecting: false,
      });
    });
  });
});
