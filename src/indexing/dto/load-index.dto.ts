import { IsNotEmpty, IsOptional, IsString } from 'class-validator';

export class LoadIndexDto {
  // defaults to PRECOMPUTED_INDEX_DIR
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  directory?: string;
}
