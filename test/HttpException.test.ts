import { describe, expect, it } from 'vitest';
import {
  BadRequestException,
  HttpException,
  InternalServerErrorException,
  JSONResponse,
  MethodNotAllowedException,
  NotFoundException,
  PlainTextResponse,
} from '../lib';
import { readResponse } from './helpers';
import type { SendMessage } from '../lib';

async function sendAll(exception: HttpException) {
  const sent: SendMessage[] = [];

  await exception.getResponse().send(async (message) => {
    sent.push(message);
  });

  return readResponse(sent);
}

describe('HttpException', () => {
  describe('constructor', () => {
    it('should create HttpException with string body', () => {
      const exception = new HttpException(404, 'Not Found');

      expect(exception.status).toBe(404);
      expect(exception.body).toBe('Not Found');
      expect(exception.message).toBe('Not Found');
      expect(exception.name).toBe('HttpException');
    });

    it('should create HttpException with object body', () => {
      const body = { error: 'Invalid input', field: 'email' };
      const exception = new HttpException(400, body);

      expect(exception.status).toBe(400);
      expect(exception.body).toEqual(body);
      expect(exception.message).toBe(JSON.stringify(body));
    });

    it('should create HttpException with custom headers', () => {
      const exception = new HttpException(429, 'Too Many Requests', {
        headers: { 'Retry-After': '60' },
      });

      expect(exception.options?.headers).toEqual({ 'Retry-After': '60' });
    });

    it('should default the body to the status phrase', () => {
      expect(new HttpException(503).body).toBe('Service Unavailable');
      expect(new HttpException(799).body).toBe('');
    });

    it('should name subclasses after themselves', () => {
      expect(new BadRequestException().name).toBe('BadRequestException');
      expect(new NotFoundException().status).toBe(404);
      expect(new InternalServerErrorException().body).toBe('Internal Server Error');
    });
  });

  describe('getResponse', () => {
    it('should convert string body to a plain-text response', async () => {
      const exception = new HttpException(404, 'Not Found');

      expect(exception.getResponse()).toBeInstanceOf(PlainTextResponse);
      expect(await sendAll(exception)).toEqual({
        status: 404,
        headers: { 'content-length': '9', 'content-type': 'text/plain; charset=utf-8' },
        text: 'Not Found',
      });
    });

    it('should convert object body to a JSON response', async () => {
      const exception = new HttpException(422, { error: 'Unprocessable' });

      expect(exception.getResponse()).toBeInstanceOf(JSONResponse);
      expect(await sendAll(exception)).toEqual({
        status: 422,
        headers: { 'content-length': '25', 'content-type': 'application/json' },
        text: '{"error":"Unprocessable"}',
      });
    });

    it('should carry custom headers', async () => {
      const exception = new HttpException(401, 'Unauthorized', {
        headers: { 'WWW-Authenticate': 'Bearer' },
      });

      const response = await sendAll(exception);

      expect(response.headers['www-authenticate']).toBe('Bearer');
    });
  });

  describe('MethodNotAllowedException', () => {
    it('should list the allowed methods in the Allow header', async () => {
      const exception = new MethodNotAllowedException(['GET', 'HEAD']);

      expect(exception.allowed).toEqual(['GET', 'HEAD']);
      expect(await sendAll(exception)).toEqual({
        status: 405,
        headers: {
          allow: 'GET, HEAD',
          'content-length': '18',
          'content-type': 'text/plain; charset=utf-8',
        },
        text: 'Method Not Allowed',
      });
    });
  });
});
