/**
 * Query Response DTO
 */

import type { BackendDescription } from '../providers/types';
import type { AnswerResult } from '../services/answer.service';

export type AnswerResponseDto = AnswerResult;

export interface BackendListDto {
  defaultBackend: string;
  backends: BackendDescription[];
}

export interface PromptTemplateDto {
  template: string;
  defaultTemplate: string;
  isDefault: boolean;
}
