/**
 * Build Index DTO
 * `files` is required, and only read, in `provided` mode
 */

import {
  ArrayMaxSize,
  ArrayMinSize,
  IsArray,
  IsIn,
  IsNotEmpty,
  IsString,
  ValidateIf,
} from 'class-validator';

export const SELECTION_MODES = ['provided', 'corpus'] as const;

export class BuildIndexDto {
  @IsIn(SELECTION_MODES)
  mode!: (typeof SELECTION_MODES)[number];

  @ValidateIf((dto: BuildIndexDto) => dto.mode === 'provided')
  @IsArray()
  @ArrayMinSize(1)
  @ArrayMaxSize(1000)
  @IsString({ each: true })
  @IsNotEmpty({ each: true })
  files?: string[];
}
