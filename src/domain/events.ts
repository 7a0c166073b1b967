/**
 * Outbound event model.
 *
 * Events are published after the store change they describe has been
 * committed. Delivery is at-least-once; subscribers must be idempotent.
 */

/** Topic a profile create or update announces itself on. */
export const TOPIC_PROFILE_INIT = 'profile-initialised';

export interface ProfileInitPayload {
  provider_name: string;
  project_id: string;
}

/** An event as handed to subscribers; the payload is JSON text. */
export interface EventMessage {
  id: string;
  topic: string;
  timestamp: string;
  payload: string;
}

export type EventHandler = (message: EventMessage) => void | Promise<void>;

/** Outbound half of the event bus. */
export interface EventPublisher {
  publish(topic: string, payload: unknown): Promise<void>;
}
