import { Module } from '@nestjs/common';
import { TUTOR_CONFIG, TutorConfig } from '../../utils/config';
import { InMemoryVectorIndex } from './in-memory-vector-index';
import { VECTOR_INDEX } from './vector-index';

@Module({
    providers: [
        {
            provide: VECTOR_INDEX,
            inject: [TUTOR_CONFIG],
            useFactory: (config: TutorConfig) => new InMemoryVectorIndex(config.embeddingDimension),
        },
    ],
    exports: [VECTOR_INDEX],
})
export class VectorIndexModule {}
