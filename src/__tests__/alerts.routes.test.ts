import request from 'supertest';
import { afterEach, describe, expect, it, vi } from 'vitest';

import { createAlertsRoutes } from '@api/routes/alerts.routes.js';

import type { AlertRuntime } from '@services/alert/alert.runtime.js';

import { buildTestApp } from '@test/utils/buildTestApp.js';
import { buildRuntime, incomingPayload } from '@test/utils/fakes.js';

describe('/v1/alerts', () => {
  let runtime: AlertRuntime | undefined;

  afterEach(async () => {
    await runtime?.shutdown();
    runtime = undefined;
  });

  function setup() {
    const built = buildRuntime();
    runtime = built.runtime;
    const app = buildTestApp(createAlertsRoutes(built.runtime), '/v1/alerts');
    return { ...built, app };
  }

  it('reports an idle station', async () => {
    const { app } = setup();

    const res = await request(app).get('/v1/alerts/current');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: 'IDLE', orderId: null, version: 0, surface: null });
  });

  it('returns the surface of the ringing order', async () => {
    const { app, runtime } = setup();
    await runtime.receiver.onEvent(incomingPayload('100', { name: 'Asha', total: '250' }), 'incoming');

    const res = await request(app).get('/v1/alerts/current');

    expect(res.body.status).toBe('RINGING');
    expect(res.body.orderId).toBe('100');
    expect(res.body.surface.summary).toBe('Asha · ₹250');
    expect(res.body.surface.slide).toMatchObject({ phase: 'idle', offset: 0, maxSlide: 144 });
  });

  it('validates the gesture body', async () => {
    const { app } = setup();

    const res = await request(app).post('/v1/alerts/current/gesture').send({ type: 'drag' });

    expect(res.status).toBe(422);
    expect(res.body.code).toBe('VALIDATION_ERROR');
  });

  it('answers 404 when nothing is presented', async () => {
    const { app } = setup();

    const res = await request(app)
      .post('/v1/alerts/current/gesture')
      .send({ surfaceId: 'surface-1', type: 'release' });

    expect(res.status).toBe(404);
  });

  it('answers 409 for a surface that is no longer current', async () => {
    const { app, runtime } = setup();
    await runtime.receiver.onEvent(incomingPayload('100'), 'incoming');
    const stale = runtime.current().surface?.surfaceId;
    await runtime.receiver.onEvent(incomingPayload('101'), 'incoming');

    const res = await request(app).post('/v1/alerts/current/gesture').send({ surfaceId: stale, type: 'release' });

    expect(res.status).toBe(409);
    expect(res.body.data).toEqual({ surfaceId: runtime.current().surface?.surfaceId });
  });

  it('drags and releases the thumb into a decision', async () => {
    const { app, runtime } = setup();
    await runtime.receiver.onEvent(incomingPayload('100'), 'incoming');
    const surfaceId = runtime.current().surface?.surfaceId;

    const drag = await request(app)
      .post('/v1/alerts/current/gesture')
      .send({ surfaceId, type: 'drag', offset: 72 });
    expect(drag.status).toBe(200);
    expect(drag.body).toEqual({
      surfaceId,
      result: { ignored: false, offset: 72, tint: { direction: 'accept', intensity: 0.5 } },
    });

    const release = await request(app).post('/v1/alerts/current/gesture').send({ surfaceId, type: 'release' });
    expect(release.body.result).toEqual({ outcome: 'accepted', settleTo: 144 });

    await vi.waitFor(() => expect(runtime.current().status).toBe('IDLE'));
    await vi.waitFor(async () =>
      expect(await runtime.relay.drainPending()).toMatchObject({ orderId: '100', decision: 'accepted' }),
    );
  });

  it('silences the ring but keeps the alert', async () => {
    const { app, runtime, audio } = setup();
    await runtime.receiver.onEvent(incomingPayload('100'), 'incoming');
    await vi.waitFor(() => expect(audio.calls).toContain('play'));

    const res = await request(app).post('/v1/alerts/current/silence');

    expect(res.status).toBe(204);
    expect(audio.calls.at(-1)).toBe('restore');
    expect(runtime.current().status).toBe('RINGING');
  });
});
