import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TUTOR_CONFIG, tutorConfigFactory } from '../../utils/config';

@Global()
@Module({
    providers: [
        {
            provide: TUTOR_CONFIG,
            inject: [ConfigService],
            useFactory: tutorConfigFactory,
        },
    ],
    exports: [TUTOR_CONFIG],
})
export class TutorConfigModule {}
