import { IsString, Matches } from 'class-validator';

export class TemplateUpdateDto {
  @IsString()
  @Matches(/\S/, { message: 'template must not be blank' })
  template!: string;
}
