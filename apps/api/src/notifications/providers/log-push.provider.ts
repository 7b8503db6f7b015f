import { Injectable } from '@nestjs/common';
import { AppLogger } from '../../common/app-logger';
import type { PushMessage, PushProvider, PushSendResult } from '../push.provider';

const maskToken = (token: string) =>
  token.length <= 8 ? '***' : `${token.slice(0, 4)}...${token.slice(-4)}`;

@Injectable()
export class LogPushProvider implements PushProvider {
  private readonly logger = new AppLogger(LogPushProvider.name);

  send(message: PushMessage): Promise<PushSendResult> {
    this.logger.log(
      `[DEV] push to ${maskToken(message.token)}: ${message.title} | ${message.body}`,
    );
    return Promise.resolve({ ok: true });
  }
}
