import express, { type Request, type Response } from 'express';
import { jest } from '@jest/globals';

export interface MockResponse {
  res: Response;
  status: jest.Mock<(code: number) => Response>;
  json: jest.Mock<(body?: unknown) => Response>;
}

/** A Response whose status and json calls are recorded instead of written to a socket. */
export function createMockResponse(): MockResponse {
  const res: Response = Object.create(express.response);
  const status = jest.fn((_code: number) => res);
  const json = jest.fn((_body?: unknown) => res);
  res.status = status;
  res.json = json;
  return { res, status, json };
}

export function createMockRequest(): Request {
  return Object.create(express.request);
}
