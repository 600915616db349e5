import WebSocket from 'ws';
import { FEED_CALL_TIMEOUT_MS, HITBTC_WS_URL } from './constants';
import { DecodeError } from './errors';
import { normalizeSymbol } from './symbolCatalog';
import { decodeTickerUpdate, isRecord } from './tickerDecode';
import type { RawTickerUpdate, TickerFeedTransport } from './types';
import { UpdateChannel } from './updateChannel';

export interface FeedSocket {
  send(payload: string): void;
  close(): void;
}

export interface FeedSocketHandlers {
  onOpen(): void;
  onMessage(text: string): void;
  onClose(): void;
  onError(error: Error): void;
}

export type FeedSocketFactory = (url: string, handlers: FeedSocketHandlers) => FeedSocket;

export interface HitbtcFeedClientOptions {
  url?: string;
  callTimeoutMs?: number;
  createSocket?: FeedSocketFactory;
}

interface PendingCall {
  method: string;
  resolve: (result: unknown) => void;
  reject: (error: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

interface PendingOpen {
  resolve: () => void;
  reject: (error: Error) => void;
}

function decodeFrame(data: WebSocket.RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString('utf8');
  }
  return data.toString('utf8');
}

export const openWebSocket: FeedSocketFactory = (url, handlers) => {
  const socket = new WebSocket(url);
  socket.on('open', () => handlers.onOpen());
  socket.on('message', (data) => handlers.onMessage(decodeFrame(data)));
  socket.on('close', () => handlers.onClose());
  socket.on('error', (error) => handlers.onError(error));
  return {
    send: (payload) => socket.send(payload),
    close: () => socket.close()
  };
};

function rpcErrorMessage(method: string, error: Record<string, unknown>): string {
  const message = typeof error.message === 'string' ? error.message : 'Unknown error';
  return `HitBTC ${method} failed (${String(error.code)}): ${message}`;
}

/**
 * JSON-RPC 2.0 client for the exchange's websocket API. Ticker notifications
 * are routed to one channel per subscribed symbol.
 */
export class HitbtcFeedClient implements TickerFeedTransport {
  private readonly url: string;
  private readonly callTimeoutMs: number;
  private readonly createSocket: FeedSocketFactory;
  private socket: FeedSocket | null = null;
  private isOpen = false;
  private pendingOpen: PendingOpen | null = null;
  private connecting: Promise<void> | null = null;
  private nextCallId = 1;
  private pendingCalls = new Map<number, PendingCall>();
  private channels = new Map<string, UpdateChannel<RawTickerUpdate>>();
  private errorListeners = new Map<number, (error: Error) => void>();
  private nextListenerId = 1;

  constructor(options: HitbtcFeedClientOptions = {}) {
    this.url = options.url ?? HITBTC_WS_URL;
    this.callTimeoutMs = options.callTimeoutMs ?? FEED_CALL_TIMEOUT_MS;
    this.createSocket = options.createSocket ?? openWebSocket;
  }

  get connected(): boolean {
    return this.isOpen;
  }

  connect(): Promise<void> {
    if (this.isOpen) {
      return Promise.resolve();
    }
    if (this.connecting) {
      return this.connecting;
    }
    this.connecting = new Promise<void>((resolve, reject) => {
      this.pendingOpen = { resolve, reject };
      let socket: FeedSocket | null = null;
      const isCurrent = (): boolean => socket !== null && this.socket === socket;
      socket = this.createSocket(this.url, {
        onOpen: () => {
          if (!isCurrent()) {
            return;
          }
          this.isOpen = true;
          this.pendingOpen?.resolve();
          this.pendingOpen = null;
        },
        onMessage: (text) => {
          if (isCurrent()) {
            this.handleMessage(text);
          }
        },
        onClose: () => {
          if (isCurrent()) {
            this.handleClose(new Error('Feed connection closed'));
          }
        },
        onError: (error) => {
          if (!isCurrent()) {
            return;
          }
          if (this.pendingOpen) {
            this.handleClose(error);
          } else {
            this.notifyError(error);
          }
        }
      });
      this.socket = socket;
    }).finally(() => {
      this.connecting = null;
    });
    return this.connecting;
  }

  async subscribe(symbolRaw: string): Promise<UpdateChannel<RawTickerUpdate>> {
    const symbol = normalizeSymbol(symbolRaw);
    const success = await this.call('subscribeTicker', { symbol });
    if (success !== true) {
      throw new Error('Subscribe not successful');
    }
    let channel = this.channels.get(symbol);
    if (!channel) {
      channel = new UpdateChannel<RawTickerUpdate>();
      this.channels.set(symbol, channel);
    }
    return channel;
  }

  /** Closes the symbol's channel even when the remote call fails. */
  async unsubscribe(symbolRaw: string): Promise<void> {
    const symbol = normalizeSymbol(symbolRaw);
    try {
      const success = await this.call('unsubscribeTicker', { symbol });
      if (success !== true) {
        throw new Error('Unsubscribe not successful');
      }
    } finally {
      this.channels.get(symbol)?.close();
      this.channels.delete(symbol);
    }
  }

  onError(listener: (error: Error) => void): () => void {
    const id = this.nextListenerId++;
    this.errorListeners.set(id, listener);
    return () => {
      this.errorListeners.delete(id);
    };
  }

  close(): void {
    const socket = this.socket;
    this.handleClose(new Error('Feed connection closed'));
    socket?.close();
  }

  private call(method: string, params: Record<string, unknown>): Promise<unknown> {
    const socket = this.socket;
    if (!socket || !this.isOpen) {
      return Promise.reject(new Error('Connection is uninitialized'));
    }
    const id = this.nextCallId++;
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pendingCalls.delete(id);
        reject(new Error(`HitBTC ${method} timed out after ${this.callTimeoutMs}ms`));
      }, this.callTimeoutMs);
      this.pendingCalls.set(id, { method, resolve, reject, timer });
      try {
        socket.send(JSON.stringify({ jsonrpc: '2.0', method, params, id }));
      } catch (error) {
        clearTimeout(timer);
        this.pendingCalls.delete(id);
        reject(error instanceof Error ? error : new Error(String(error)));
      }
    });
  }

  private handleMessage(text: string): void {
    let message: unknown;
    try {
      message = JSON.parse(text);
    } catch {
      this.notifyError(new DecodeError('Failed to parse feed message', text));
      return;
    }
    if (!isRecord(message)) {
      this.notifyError(new DecodeError('Feed message is not an object', message));
      return;
    }

    if (typeof message.method === 'string') {
      this.handleNotification(message.method, message.params);
      return;
    }

    if (typeof message.id === 'number') {
      const call = this.pendingCalls.get(message.id);
      if (!call) {
        return;
      }
      this.pendingCalls.delete(message.id);
      clearTimeout(call.timer);
      if (isRecord(message.error)) {
        call.reject(new Error(rpcErrorMessage(call.method, message.error)));
      } else {
        call.resolve(message.result);
      }
      return;
    }

    this.notifyError(new DecodeError('Unknown feed message', message));
  }

  private handleNotification(method: string, params: unknown): void {
    if (method !== 'ticker') {
      return;
    }
    let update: RawTickerUpdate;
    try {
      update = decodeTickerUpdate(params);
    } catch (error) {
      this.notifyError(error instanceof Error ? error : new DecodeError(String(error), params));
      return;
    }
    this.channels.get(update.symbol)?.push(update);
  }

  private handleClose(reason: Error): void {
    this.socket = null;
    this.isOpen = false;

    if (this.pendingOpen) {
      this.pendingOpen.reject(reason);
      this.pendingOpen = null;
    }
    for (const call of this.pendingCalls.values()) {
      clearTimeout(call.timer);
      call.reject(reason);
    }
    this.pendingCalls.clear();
    for (const channel of this.channels.values()) {
      channel.close();
    }
    this.channels.clear();
  }

  private notifyError(error: Error): void {
    let handled = false;
    for (const listener of this.errorListeners.values()) {
      handled = true;
      try {
        listener(error);
      } catch (err) {
        console.error('[feed] error listener failed', err);
      }
    }
    if (!handled) {
      console.error('[feed] stream error', error);
    }
  }
}
