/**
 * Session HTTP Controller
 * Chat history and lifecycle of the current session
 */

import {
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  Post,
} from '@nestjs/common';
import type { ChatTurn } from './session-context';
import { SessionService } from './session.service';

@Controller('session')
export class SessionController {
  private readonly logger = new Logger(SessionController.name);

  constructor(private readonly sessionService: SessionService) {}

  /**
   * GET /session/history
   */
  @Get('history')
  getHistory(): { sessionId: string; turns: ChatTurn[] } {
    const session = this.sessionService.current();
    return { sessionId: session.id, turns: session.history };
  }

  /**
   * DELETE /session/history
   */
  @Delete('history')
  clearHistory(): { cleared: number } {
    const cleared = this.sessionService.current().clearHistory();
    this.logger.log(`Cleared ${cleared} turns from history`);
    return { cleared };
  }

  /**
   * POST /session/restart
   * Drops the active index, the custom template and the history.
   */
  @Post('restart')
  @HttpCode(HttpStatus.OK)
  restart(): { sessionId: string; createdAt: string } {
    const session = this.sessionService.restart();
    return { sessionId: session.id, createdAt: session.createdAt };
  }
}
