/**
 * Local redirect capture for the implicit grant.
 *
 * Serves the redirect URI on a loopback address, receives the fragment the
 * callback page posts back, and runs it through the redirect middleware.
 */

import express from 'express';
import type { Server } from 'http';
import { z } from 'zod';
import {
  fragmentFromLocation,
  withAuthRedirect,
  type AuthError,
  type AuthorizeResponse,
  type NavigatedEvent,
  type Transition,
  type UserAuth,
} from '../dropbox/index.js';
import { assertLoopbackRedirectUri } from '../security/urlValidation.js';
import { callbackPage, errorPage, successPage } from './html.js';

export const DEFAULT_CALLBACK_TIMEOUT_MS = 120_000;

export interface CapturedAuthorization {
  auth: UserAuth;
  response: AuthorizeResponse;
}

export type CallbackState =
  | { phase: 'waiting' }
  | { phase: 'authorized'; captured: CapturedAuthorization }
  | { phase: 'failed'; message: string };

export interface CallbackReply {
  status: number;
  ok: boolean;
  message: string;
}

export interface CallbackServer {
  /** Redirect URI as actually bound (the port is filled in when 0 was asked for). */
  redirectUri: string;
  waitForAuthorization(): Promise<CapturedAuthorization>;
  close(): Promise<void>;
}

export interface CallbackServerOptions {
  redirectUri: string;
  timeoutMs?: number;
}

const FragmentBodySchema = z.object({
  hash: z.string().max(8192),
});

function decodeFormValue(value: string): string {
  const spaced = value.replace(/\+/g, ' ');
  try {
    return decodeURIComponent(spaced);
  } catch {
    return spaced;
  }
}

function deniedMessage(error: string, description: string | undefined): string {
  return `Dropbox denied the request: ${description || error}`;
}

/**
 * Reply for a navigation once the middleware has folded any authorization
 * into the state.
 */
function replyFor(event: NavigatedEvent, state: CallbackState): Transition<CallbackState, CallbackReply> {
  switch (state.phase) {
    case 'authorized':
      return {
        state,
        effects: [{
          status: 200,
          ok: true,
          message: 'Authorization complete. You can close this window and return to your terminal.',
        }],
      };
    case 'failed':
      return { state, effects: [{ status: 400, ok: false, message: state.message }] };
    case 'waiting': {
      const fragment = fragmentFromLocation(event.location);
      const error = fragment?.get('error');
      if (error !== undefined) {
        const description = fragment?.get('error_description');
        const message = deniedMessage(error, description && decodeFormValue(description));
        return {
          state: { phase: 'failed', message },
          effects: [{ status: 400, ok: false, message }],
        };
      }
      return {
        state,
        effects: [{ status: 400, ok: false, message: 'No authorization found in the redirect.' }],
      };
    }
  }
}

export const callbackUpdate = withAuthRedirect<never, CallbackState, CallbackReply>({
  onAuthorized: (auth, response) => ({
    state: { phase: 'authorized', captured: { auth, response } },
    effects: [],
  }),
  onAuthError: (error: AuthError) => ({
    state: { phase: 'failed', message: error.message },
    effects: [],
  }),
  update: (event, state) => replyFor(event, state),
});

export async function startCallbackServer(options: CallbackServerOptions): Promise<CallbackServer> {
  const redirect = assertLoopbackRedirectUri(options.redirectUri);
  const callbackPath = redirect.pathname;
  const fragmentPath = `${callbackPath.replace(/\/+$/, '')}/fragment`;
  const host = redirect.hostname.replace(/^\[|\]$/g, '');
  const port = redirect.port ? Number(redirect.port) : 80;

  let state: CallbackState = { phase: 'waiting' };
  let settle: (final: CallbackState) => void = () => undefined;
  const settled = new Promise<CallbackState>((resolve) => {
    settle = resolve;
  });

  const app = express();
  app.use(express.json({ limit: '16kb' }));

  app.get(callbackPath, (req, res) => {
    const error = req.query.error;
    if (state.phase === 'waiting' && typeof error === 'string') {
      const description = req.query.error_description;
      const message = deniedMessage(error, typeof description === 'string' ? description : undefined);
      state = { phase: 'failed', message };
      settle(state);
      res.status(400).send(errorPage(message));
      return;
    }

    switch (state.phase) {
      case 'waiting':
        res.send(callbackPage(fragmentPath));
        return;
      case 'authorized':
        res.send(successPage());
        return;
      case 'failed':
        res.status(400).send(errorPage(state.message));
        return;
    }
  });

  app.post(fragmentPath, (req, res) => {
    const body = FragmentBodySchema.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({ ok: false, message: 'Expected a JSON body with a "hash" string.' });
      return;
    }

    if (state.phase !== 'waiting') {
      res.status(409).json({ ok: false, message: 'This authorization request has already been handled.' });
      return;
    }

    const fragment = body.data.hash.replace(/^#/, '');
    const transition = callbackUpdate(
      { type: 'navigated', location: `${redirect.origin}${redirect.pathname}#${fragment}` },
      state,
    );
    state = transition.state;
    if (state.phase !== 'waiting') {
      settle(state);
    }

    const reply = transition.effects[transition.effects.length - 1];
    if (!reply) {
      res.status(500).json({ ok: false, message: 'No reply produced for the redirect.' });
      return;
    }
    res.status(reply.status).json({ ok: reply.ok, message: reply.message });
  });

  const server = await new Promise<Server>((resolve, reject) => {
    const listening = app.listen(port, host, () => resolve(listening));
    listening.once('error', reject);
  });

  const address = server.address();
  if (address === null || typeof address === 'string') {
    server.close();
    throw new Error('Callback server did not bind to a TCP port.');
  }
  const bound = new URL(redirect.toString());
  bound.port = String(address.port);

  return {
    redirectUri: `${bound.origin}${bound.pathname}`,

    waitForAuthorization: () => new Promise<CapturedAuthorization>((resolve, reject) => {
      const timeoutMs = options.timeoutMs ?? DEFAULT_CALLBACK_TIMEOUT_MS;
      const timer = setTimeout(() => {
        reject(new Error('Timed out waiting for the Dropbox redirect.'));
      }, timeoutMs);
      timer.unref();

      settled.then((final) => {
        clearTimeout(timer);
        if (final.phase === 'authorized') {
          resolve(final.captured);
        } else if (final.phase === 'failed') {
          reject(new Error(final.message));
        }
      }, reject);
    }),

    close: () => new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
      server.closeAllConnections();
    }),
  };
}
