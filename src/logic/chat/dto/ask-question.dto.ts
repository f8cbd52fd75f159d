import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

export class AskQuestionDto {
  @IsString()
  @MaxLength(4000)
  question!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(191)
  sessionId!: string;
}
