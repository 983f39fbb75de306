import { Application } from 'express';
import request from 'supertest';
import { createApp } from '../../app';
import { buildTestContext, TestContext } from '../helpers/test-services';

export interface TestApp extends TestContext {
  app: Application;
}

export function buildTestApp(options: { requireConfirmedUser?: boolean } = {}): TestApp {
  const requireConfirmedUser = options.requireConfirmedUser ?? true;
  const context = buildTestContext({ requireConfirmedUser });
  const app = createApp(context.services, { requireConfirmedUser, requireHttps: false });
  return { ...context, app };
}

export const authPost = (app: Application, path: string, credential: string) =>
  request(app)
    .post(path)
    .set('Authorization', `Bearer ${credential}`)
    .set('Content-Type', 'application/json');

export const authGet = (app: Application, path: string, credential: string) =>
  request(app).get(path).set('Authorization', `Bearer ${credential}`);

export const authDelete = (app: Application, path: string, credential: string) =>
  request(app).delete(path).set('Authorization', `Bearer ${credential}`);

export const INVALID_CREDENTIALS = { error: 'Unauthorized', message: 'Invalid credentials' };
