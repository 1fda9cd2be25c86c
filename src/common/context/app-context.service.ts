// src/common/context/app-context.service.ts
import { BadRequestException, Injectable } from '@nestjs/common';
import { ClsService } from 'nestjs-cls';
import { AppClsStore } from './cls-store.type';
import { ContextErrors } from '../errors/context.errors';

@Injectable()
export class AppContextService {
  constructor(
    private readonly cls: ClsService<AppClsStore>,
  ) {}

  // ---- Cart session ----
  getSessionIdOrThrow(): string {
    const sessionId = this.cls.get('sessionId');
    if (!sessionId) {
      throw new BadRequestException(ContextErrors.SESSION_NOT_FOUND);
    }
    return sessionId;
  }
}
