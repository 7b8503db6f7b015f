export const PUSH_PROVIDER = Symbol('PUSH_PROVIDER');
export const PUSH_TOKEN_CACHE = Symbol('PUSH_TOKEN_CACHE');

export type PushMessage = {
  token: string;
  title: string;
  body: string;
  data: Record<string, string>;
};

export type PushSendResult = {
  ok: boolean;
  providerMessageId?: string;
  error?: string;
};

export interface PushProvider {
  send(message: PushMessage): Promise<PushSendResult>;
}
