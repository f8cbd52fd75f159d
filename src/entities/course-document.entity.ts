import { Entity, PrimaryColumn, Column, CreateDateColumn, OneToMany } from 'typeorm';
import { SourceFormat } from '../utils/types';
import { DocumentChunk } from './document-chunk.entity';

@Entity('course_documents')
export class CourseDocument {
  @PrimaryColumn({ type: 'varchar', length: 191 })
  id!: string;

  @Column()
  filename!: string;

  @Column({
    type: 'enum',
    enum: SourceFormat
  })
  sourceFormat!: SourceFormat;

  @Column()
  characterCount!: number;

  @Column()
  chunkCount!: number;

  @CreateDateColumn()
  uploadedAt!: Date;

  @OneToMany(() => DocumentChunk, chunk => chunk.document, { cascade: true })
  chunks!: DocumentChunk[];
}
