import { IsEnum, IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';
import { SourceFormat } from '../../../utils/types';

export class IngestDocumentDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @MaxLength(191)
  documentId?: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  filename!: string;

  @IsString()
  text!: string;

  @IsEnum(SourceFormat)
  sourceFormat!: SourceFormat;
}
