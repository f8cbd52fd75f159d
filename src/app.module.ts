import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AppController } from './app.controller';
import { ENTITIES } from './entities';
import { ChatModule } from './logic/chat/chat.module';
import { ChatMemoryModule } from './logic/chat-memory/chat-memory.module';
import { DocumentsModule } from './logic/documents/documents.module';
import { GeminiModule } from './logic/gemini/gemini.module';
import { SocketGatewayModule } from './logic/socket-gateway/socket-gateway.module';
import { TutorConfigModule } from './logic/tutor-config/tutor-config.module';
import { TUTOR_CONFIG, TutorConfig, validateEnv } from './utils/config';

@Module({
  imports: [
    ScheduleModule.forRoot(),
    ConfigModule.forRoot({ isGlobal: true, validate: validateEnv }),
    TutorConfigModule,
    TypeOrmModule.forRootAsync({
      inject: [TUTOR_CONFIG],
      useFactory: (config: TutorConfig) => ({
        type: 'mysql',
        host: config.database.host,
        port: config.database.port,
        username: config.database.username,
        password: config.database.password,
        database: config.database.database,
        entities: ENTITIES,
        synchronize: config.database.synchronize,
        logging: process.env.NODE_ENV === 'development',
      }),
    }),
    GeminiModule,
    ChatMemoryModule,
    ChatModule,
    DocumentsModule,
    SocketGatewayModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
