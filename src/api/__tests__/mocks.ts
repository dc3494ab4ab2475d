// ═══════════════════════════════════════════════════════════════════════════════
// EXPRESS MOCKS — Minimal Request/Response Doubles for Handler Tests
// ═══════════════════════════════════════════════════════════════════════════════

import type { Request, Response } from 'express';

export function createMockRequest(overrides: Partial<Request> = {}): Request {
  return {
    path: '/test',
    method: 'GET',
    headers: {},
    body: {},
    query: {},
    params: {},
    ...overrides,
  } as unknown as Request;
}

export type MockResponse = Response & {
  _status: number;
  _json: unknown;
  _ended: boolean;
};

export function createMockResponse(): MockResponse {
  const res = {
    _status: 200,
    _json: null as unknown,
    _ended: false,
    status(code: number) {
      this._status = code;
      return this;
    },
    json(data: unknown) {
      this._json = data;
      this._ended = true;
      return this;
    },
    end() {
      this._ended = true;
      return this;
    },
  };
  return res as unknown as MockResponse;
}
