import { CourseDocument } from './course-document.entity';
import { DocumentChunk } from './document-chunk.entity';

export { CourseDocument, DocumentChunk };

export const ENTITIES = [CourseDocument, DocumentChunk];
