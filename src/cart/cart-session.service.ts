import { ConflictException, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CartEngine } from './cart-engine';
import { CartErrors } from '../common/errors/cart.errors';

const DEFAULT_IDLE_MINUTES = 240;
const DEFAULT_SESSION_LIMIT = 1000;

interface CartSession {
  cart: CartEngine;
  lastTouchedAt: number;
}

/**
 * One cart per session id.
 *
 * Sessions idle longer than CART_SESSION_IDLE_MINUTES are dropped, and past
 * CART_SESSION_LIMIT the least recently used one is dropped. A cart that is
 * being checked out is never dropped.
 */
@Injectable()
export class CartSessionService {
  private readonly logger = new Logger(CartSessionService.name);
  // insertion order == least recently touched first
  private readonly sessions = new Map<string, CartSession>();

  constructor(private readonly config: ConfigService) {}

  private defaultTaxRate(): number {
    const raw = Number(this.config.get<string>('DEFAULT_TAX_RATE') ?? 0);
    return Number.isFinite(raw) && raw >= 0 && raw <= 100 ? raw : 0;
  }

  private positiveSetting(key: string, fallback: number): number {
    const raw = Number(this.config.get<string>(key) ?? fallback);
    return Number.isFinite(raw) && raw > 0 ? raw : fallback;
  }

  private get idleMs(): number {
    return this.positiveSetting('CART_SESSION_IDLE_MINUTES', DEFAULT_IDLE_MINUTES) * 60_000;
  }

  private get sessionLimit(): number {
    return Math.floor(this.positiveSetting('CART_SESSION_LIMIT', DEFAULT_SESSION_LIMIT));
  }

  private isExpired(session: CartSession, now: number): boolean {
    return !session.cart.checkoutInProgress && now - session.lastTouchedAt > this.idleMs;
  }

  private touch(sessionId: string, session: CartSession, now: number): CartEngine {
    session.lastTouchedAt = now;
    this.sessions.delete(sessionId);
    this.sessions.set(sessionId, session);
    return session.cart;
  }

  private evict(now: number): void {
    for (const [sessionId, session] of this.sessions) {
      if (this.isExpired(session, now)) {
        this.sessions.delete(sessionId);
        this.logger.log(`Cart session expired: ${sessionId}`);
      }
    }

    for (const [sessionId, session] of this.sessions) {
      if (this.sessions.size < this.sessionLimit) {
        break;
      }
      if (!session.cart.checkoutInProgress) {
        this.sessions.delete(sessionId);
        this.logger.warn(`Cart session limit reached, dropped: ${sessionId}`);
      }
    }
  }

  /**
   * Existing cart for the session, or undefined. Never creates one.
   */
  find(sessionId: string): CartEngine | undefined {
    const now = Date.now();
    const session = this.sessions.get(sessionId);

    if (!session) {
      return undefined;
    }

    if (this.isExpired(session, now)) {
      this.sessions.delete(sessionId);
      this.logger.log(`Cart session expired: ${sessionId}`);
      return undefined;
    }

    return this.touch(sessionId, session, now);
  }

  getOrCreate(sessionId: string): CartEngine {
    const existing = this.find(sessionId);
    if (existing) {
      return existing;
    }

    const now = Date.now();
    this.evict(now);

    const cart = this.createDetached();
    this.sessions.set(sessionId, { cart, lastTouchedAt: now });
    this.logger.log(`Cart session opened: ${sessionId}`);

    return cart;
  }

  // empty cart with the session defaults, not stored
  createDetached(): CartEngine {
    return new CartEngine({ taxRatePercent: this.defaultTaxRate() });
  }

  discard(sessionId: string): boolean {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return false;
    }

    if (session.cart.checkoutInProgress) {
      throw new ConflictException(CartErrors.CHECKOUT_IN_PROGRESS);
    }

    this.sessions.delete(sessionId);
    this.logger.log(`Cart session discarded: ${sessionId}`);
    return true;
  }

  get activeSessionCount(): number {
    return this.sessions.size;
  }
}
