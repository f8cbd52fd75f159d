import { Entity, PrimaryColumn, Column, ManyToOne, JoinColumn, Index, ValueTransformer } from 'typeorm';
import { CourseDocument } from './course-document.entity';

// stored as LONGTEXT: an oversized sentence becomes one chunk of any length
export const vectorTransformer: ValueTransformer = {
  to: (vector: number[]): string => JSON.stringify(vector),
  from: (stored: string): number[] => JSON.parse(stored),
};

@Entity('document_chunks')
@Index(['documentId', 'ordinal'], { unique: true })
export class DocumentChunk {
  // `${documentId}__${ordinal}`
  @PrimaryColumn({ type: 'varchar', length: 255 })
  id!: string;

  @Column({ type: 'varchar', length: 191 })
  documentId!: string;

  @Column()
  ordinal!: number;

  @Column({ type: 'longtext' })
  text!: string;

  @Column({ type: 'longtext', transformer: vectorTransformer })
  embedding!: number[];

  @Column()
  charStart!: number;

  @Column()
  charEnd!: number;

  @ManyToOne(() => CourseDocument, document => document.chunks, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'documentId' })
  document!: CourseDocument;
}
