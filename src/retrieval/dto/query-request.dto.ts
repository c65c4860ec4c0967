/**
 * Query Request DTO
 * Input for query answering
 */

import { IsIn, IsOptional, IsString, Matches, MaxLength } from 'class-validator';
import {
  GENERATION_BACKENDS,
  type GenerationBackendId,
} from '../providers/types';

export class QueryRequestDto {
  @IsString()
  @Matches(/\S/, { message: 'query must not be blank' })
  @MaxLength(4000)
  query!: string;

  @IsOptional()
  @IsIn(GENERATION_BACKENDS)
  backend?: GenerationBackendId;
}
