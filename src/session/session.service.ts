import { Injectable, Logger } from '@nestjs/common';
import { SessionContext } from './session-context';

/**
 * Owns the single in-process session. A restart discards it and starts a
 * fresh one; nothing is persisted.
 */
@Injectable()
export class SessionService {
  private readonly logger = new Logger(SessionService.name);
  private session = new SessionContext();

  current(): SessionContext {
    return this.session;
  }

  restart(): SessionContext {
    this.logger.log(`Ending session ${this.session.id}`);
    this.session = new SessionContext();
    this.logger.log(`Started session ${this.session.id}`);
    return this.session;
  }
}
