import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { CourseDocument, DocumentChunk } from '../../entities';
import { GeminiModule } from '../gemini/gemini.module';
import { SocketGatewayModule } from '../socket-gateway/socket-gateway.module';
import { VectorIndexModule } from '../vector-index/vector-index.module';
import { DocumentSeederService } from './document-seeder.service';
import { DocumentsController } from './documents.controller';
import { DocumentsService } from './documents.service';

@Module({
  imports: [
    TypeOrmModule.forFeature([CourseDocument, DocumentChunk]),
    GeminiModule,
    VectorIndexModule,
    SocketGatewayModule,
  ],
  controllers: [DocumentsController],
  providers: [DocumentsService, DocumentSeederService],
  exports: [DocumentsService],
})
export class DocumentsModule {}
