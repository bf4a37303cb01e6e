/**
 * Redirect orchestration as update middleware.
 *
 * An application is modelled as `update(event, state) -> { state, effects }`.
 * `withAuthRedirect` wraps such an update so that a navigation carrying an
 * OAuth redirect fragment reaches `onAuthorized` before the application
 * sees the event. Effects are plain values for the host to run; nothing
 * here renders or performs I/O.
 */

import {
  parseAuthorizationRedirect,
  type AuthorizeResponse,
  type UserAuth,
} from './authorize.js';
import type { LocationLike } from './fragment.js';
import type { AuthError } from './result.js';

export interface NavigatedEvent {
  type: 'navigated';
  location: LocationLike | string;
}

export interface Transition<S, F> {
  state: S;
  effects: F[];
}

export type Update<E, S, F> = (event: E, state: S) => Transition<S, F>;

export interface AuthRedirectHandlers<E, S, F> {
  onAuthorized: (auth: UserAuth, response: AuthorizeResponse, state: S) => Transition<S, F>;
  onAuthError?: (error: AuthError, state: S) => Transition<S, F>;
  update: Update<E | NavigatedEvent, S, F>;
}

export function isNavigatedEvent(event: unknown): event is NavigatedEvent {
  return typeof event === 'object'
    && event !== null
    && 'type' in event
    && event.type === 'navigated'
    && 'location' in event;
}

function andThen<S, F>(first: Transition<S, F>, next: (state: S) => Transition<S, F>): Transition<S, F> {
  const second = next(first.state);
  return { state: second.state, effects: [...first.effects, ...second.effects] };
}

export function withAuthRedirect<E, S, F>(
  handlers: AuthRedirectHandlers<E, S, F>,
): Update<E | NavigatedEvent, S, F> {
  return (event, state) => {
    if (!isNavigatedEvent(event)) {
      return handlers.update(event, state);
    }

    const redirect = parseAuthorizationRedirect(event.location);
    switch (redirect.type) {
      case 'authorized':
        return andThen(
          handlers.onAuthorized(redirect.auth, redirect.response, state),
          (next) => handlers.update(event, next),
        );
      case 'error':
        if (handlers.onAuthError) {
          return andThen(
            handlers.onAuthError(redirect.error, state),
            (next) => handlers.update(event, next),
          );
        }
        return handlers.update(event, state);
      case 'none':
        return handlers.update(event, state);
    }
  };
}
