import type { HomeView, KnownBlock, ModalView } from '@slack/bolt';

export interface SlackMember {
  id?: string;
  is_bot?: boolean;
  deleted?: boolean;
}

/**
 * The slice of the Bolt Web API client this app calls. `app.client` satisfies it.
 */
export interface SlackClient {
  views: {
    publish(args: { user_id: string; view: HomeView }): Promise<unknown>;
    open(args: { trigger_id: string; view: ModalView }): Promise<unknown>;
  };
  chat: {
    postMessage(args: { channel: string; text: string; blocks?: KnownBlock[] }): Promise<{ ts?: string }>;
    update(args: { channel: string; ts: string; text: string; blocks?: KnownBlock[] }): Promise<unknown>;
  };
  conversations: {
    open(args: { users: string }): Promise<{ channel?: { id?: string } }>;
  };
  pins: {
    add(args: { channel: string; timestamp: string }): Promise<unknown>;
  };
  users: {
    list(args: { cursor?: string; limit?: number }): Promise<{
      members?: SlackMember[];
      response_metadata?: { next_cursor?: string };
    }>;
  };
}
