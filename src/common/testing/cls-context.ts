import { AsyncLocalStorage } from 'node:async_hooks';
import { ClsService } from 'nestjs-cls';
import { AppClsStore } from '../context/cls-store.type';
import { AppContextService } from '../context/app-context.service';

export interface TestContext {
  cls: ClsService<AppClsStore>;
  appContext: AppContextService;
  // runs `action` as if inside a request carrying `x-session-id: sessionId`
  inSession<T>(sessionId: string | undefined, action: () => Promise<T>): Promise<T>;
}

export function createTestContext(): TestContext {
  const cls = new ClsService<AppClsStore>(new AsyncLocalStorage());

  return {
    cls,
    appContext: new AppContextService(cls),
    inSession: (sessionId, action) =>
      cls.run(async () => {
        cls.set('correlationId', 'test-correlation');
        if (sessionId) {
          cls.set('sessionId', sessionId);
        }
        return action();
      }),
  };
}
