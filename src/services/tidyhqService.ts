import { z } from 'zod';
import { GroupRecord, MemberRecord } from '../types';
import { ExternalServiceError } from '../types/errors';

const IdSchema = z.union([z.string().min(1), z.number().int()]).transform(String);

const GroupSchema = z.object({
  id: IdSchema,
  label: z.string().nullish()
});

const CustomFieldSchema = z.object({
  id: IdSchema,
  value: z.unknown().optional()
});

const ContactSchema = z.object({
  id: IdSchema,
  first_name: z.string().nullish(),
  last_name: z.string().nullish(),
  nick_name: z.string().nullish(),
  email_address: z.string().nullish(),
  groups: z.array(GroupSchema).nullish(),
  custom_fields: z.array(CustomFieldSchema).nullish()
});

export type TidyhqContact = z.infer<typeof ContactSchema>;
export type TidyhqGroup = z.infer<typeof GroupSchema>;

export interface HttpResponse {
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
}

export type FetchLike = (url: string) => Promise<HttpResponse>;

/**
 * The parts of the TidyHQ API the identity cache relies on
 */
export interface TidyhqApi {
  getContacts(): Promise<TidyhqContact[]>;
  getGroups(): Promise<TidyhqGroup[]>;
  getContact(contactId: string): Promise<TidyhqContact | undefined>;
}

export class TidyhqClient implements TidyhqApi {
  private token: string;
  private apiUrl: string;
  private fetchImpl: FetchLike;

  constructor(token: string, apiUrl: string, fetchImpl: FetchLike = (url) => fetch(url)) {
    this.token = token;
    this.apiUrl = apiUrl.replace(/\/+$/, '');
    this.fetchImpl = fetchImpl;
  }

  /**
   * GET a resource and validate the body. Resolves undefined on 404.
   * The access token never appears in error messages.
   */
  private async request<S extends z.ZodTypeAny>(resource: string, schema: S): Promise<z.infer<S> | undefined> {
    const url = new URL(`${this.apiUrl}/${resource}`);
    url.searchParams.set('access_token', this.token);

    let response: HttpResponse;
    try {
      response = await this.fetchImpl(url.toString());
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ExternalServiceError(`TidyHQ request for ${resource} failed: ${reason}`);
    }

    if (response.status === 404) {
      return undefined;
    }

    if (!response.ok) {
      throw new ExternalServiceError(`TidyHQ returned ${response.status} for ${resource}`, response.status);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      throw new ExternalServiceError(`TidyHQ returned invalid JSON for ${resource}`, response.status);
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new ExternalServiceError(`Unexpected TidyHQ response for ${resource}`, response.status);
    }

    return parsed.data;
  }

  private async requestList<S extends z.ZodTypeAny>(resource: string, schema: S): Promise<Array<z.infer<S>>> {
    const items = await this.request(resource, z.array(schema));
    if (!items) {
      throw new ExternalServiceError(`TidyHQ endpoint ${resource} not found`, 404);
    }
    return items;
  }

  getContacts(): Promise<TidyhqContact[]> {
    return this.requestList('contacts', ContactSchema);
  }

  getGroups(): Promise<TidyhqGroup[]> {
    return this.requestList('groups', GroupSchema);
  }

  getContact(contactId: string): Promise<TidyhqContact | undefined> {
    return this.request(`contacts/${encodeURIComponent(contactId)}`, ContactSchema);
  }
}

export const formatContactName = (contact: TidyhqContact): string => {
  const parts = [contact.first_name, contact.nick_name ? `"${contact.nick_name}"` : null, contact.last_name]
    .map(part => part?.trim())
    .filter((part): part is string => Boolean(part));

  if (parts.length > 0) {
    return parts.join(' ');
  }

  return contact.email_address?.trim() || `Contact ${contact.id}`;
};

/**
 * The Slack user id is kept in a TidyHQ custom field
 */
export const findSlackId = (contact: TidyhqContact, slackFieldId: string): string | undefined => {
  const field = contact.custom_fields?.find(candidate => candidate.id === slackFieldId);
  if (typeof field?.value !== 'string') {
    return undefined;
  }

  const slackId = field.value.trim();
  return slackId || undefined;
};

export const toMemberRecord = (contact: TidyhqContact, slackFieldId: string): MemberRecord => {
  const member: MemberRecord = {
    id: contact.id,
    name: formatContactName(contact),
    groups: (contact.groups ?? []).map(group => group.id)
  };

  const slackId = findSlackId(contact, slackFieldId);
  if (slackId) {
    member.slackId = slackId;
  }

  return member;
};

export const toGroupRecord = (group: TidyhqGroup): GroupRecord => ({
  id: group.id,
  label: group.label?.trim() || `Group ${group.id}`
});

export const createTidyhqClient = (token: string, apiUrl: string, fetchImpl?: FetchLike): TidyhqClient => {
  return new TidyhqClient(token, apiUrl, fetchImpl);
};
