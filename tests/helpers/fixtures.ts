import fs from 'fs';
import os from 'os';
import path from 'path';
import type { Block, HomeView, KnownBlock } from '@slack/bolt';
import { parseRewardCatalog } from '../../src/services/rewardService';
import { TidyhqApi, TidyhqContact, TidyhqGroup } from '../../src/services/tidyhqService';
import { RewardCatalog } from '../../src/types';
import { SlackClient, SlackMember } from '../../src/types/slack';

export const SLACK_FIELD_ID = 'slack-field';
export const ADMIN_GROUP_ID = '9';

export const makeTempDir = (): string => fs.mkdtempSync(path.join(os.tmpdir(), 'volunteer-hours-'));

export const removeTempDir = (dir: string): void => fs.rmSync(dir, { recursive: true, force: true });

export const contact = (id: string, firstName: string, slackId?: string, groupIds: string[] = []): TidyhqContact => ({
  id,
  first_name: firstName,
  last_name: 'Tester',
  groups: groupIds.map(groupId => ({ id: groupId, label: `Group ${groupId}` })),
  custom_fields: slackId ? [{ id: SLACK_FIELD_ID, value: slackId }] : []
});

export const defaultContacts = (): TidyhqContact[] => [
  contact('100', 'Alex', 'UADMIN', [ADMIN_GROUP_ID]),
  contact('1', 'Val', 'UVOL'),
  contact('2', 'Sam', 'UVOL2'),
  contact('3', 'Pat')
];

export class FakeTidyhq implements TidyhqApi {
  contactCalls = 0;
  failWith: Error | null = null;

  constructor(
    public contacts: TidyhqContact[] = defaultContacts(),
    public groups: TidyhqGroup[] = [{ id: ADMIN_GROUP_ID, label: 'Committee' }]
  ) {}

  async getContacts(): Promise<TidyhqContact[]> {
    this.contactCalls++;
    if (this.failWith) throw this.failWith;
    return this.contacts;
  }

  async getGroups(): Promise<TidyhqGroup[]> {
    if (this.failWith) throw this.failWith;
    return this.groups;
  }

  async getContact(contactId: string): Promise<TidyhqContact | undefined> {
    return this.contacts.find(candidate => candidate.id === contactId);
  }
}

export const sampleCatalog = (): RewardCatalog =>
  parseRewardCatalog({
    monthly: [
      { hours: 10, title: 'Free consumables', description: 'Materials for a project of your own.' },
      { hours: 5, title: 'Free drink', description: 'A drink on us.', claim: 'Ask at the front desk.' }
    ],
    cumulative: [
      { hours: 50, title: 'Hall of fame', description: 'Your name on the wall.' },
      { hours: 10, title: 'Volunteer badge', description: 'A badge for your name tag.' },
      { hours: 25, title: 'Volunteer t-shirt', description: 'A shirt in your size.' }
    ]
  });

export interface PostedMessage {
  channel: string;
  text: string;
  blocks?: KnownBlock[];
}

export interface SlackStub {
  client: SlackClient;
  published: Array<{ user_id: string; view: HomeView }>;
  messages: PostedMessage[];
  updates: Array<{ channel: string; ts: string; text: string; blocks?: KnownBlock[] }>;
  pins: Array<{ channel: string; timestamp: string }>;
}

export interface SlackStubOptions {
  userPages?: SlackMember[][];
  failPublishFor?: string[];
}

/**
 * In-memory Slack client. DM channels are `D` + the user id and users.list
 * pages are walked with the page index as the cursor.
 */
export const createSlackStub = (options: SlackStubOptions = {}): SlackStub => {
  const { userPages = [[]], failPublishFor = [] } = options;
  const published: SlackStub['published'] = [];
  const messages: SlackStub['messages'] = [];
  const updates: SlackStub['updates'] = [];
  const pins: SlackStub['pins'] = [];
  let sequence = 0;

  const client: SlackClient = {
    views: {
      publish: async args => {
        if (failPublishFor.includes(args.user_id)) {
          throw new Error('not_authed');
        }
        published.push(args);
        return {};
      },
      open: async () => ({})
    },
    chat: {
      postMessage: async args => {
        messages.push(args);
        sequence++;
        return { ts: `1700000000.${String(sequence).padStart(6, '0')}` };
      },
      update: async args => {
        updates.push(args);
        return {};
      }
    },
    conversations: {
      open: async ({ users }) => ({ channel: { id: `D${users}` } })
    },
    pins: {
      add: async args => {
        pins.push(args);
        return {};
      }
    },
    users: {
      list: async ({ cursor }) => {
        const page = cursor ? Number(cursor) : 0;
        return {
          members: userPages[page] ?? [],
          response_metadata: { next_cursor: page + 1 < userPages.length ? String(page + 1) : '' }
        };
      }
    }
  };

  return { client, published, messages, updates, pins };
};

const TEXT_BLOCK_TYPES = ['section', 'header', 'context'];

const isTextBlock = (block: Block | KnownBlock): block is KnownBlock => TEXT_BLOCK_TYPES.includes(block.type);

/**
 * Visible text of a block, for assertions
 */
export const blockText = (block: Block | KnownBlock): string | undefined => {
  if (!isTextBlock(block)) return undefined;
  switch (block.type) {
    case 'section':
      return block.text?.text;
    case 'header':
      return block.text.text;
    case 'context':
      return block.elements.map(element => ('text' in element ? element.text : '')).join(' ');
    default:
      return undefined;
  }
};

export const silenceConsole = (): void => {
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  jest.spyOn(console, 'error').mockImplementation(() => undefined);
};
