import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  Index,
} from 'typeorm';

@Entity()
export class ExtractionRun {
  @PrimaryGeneratedColumn() id!: number;

  @Index() @Column() doc_id!: string;

  @Column() hash!: string;

  @Column({ type: 'integer', default: 0 }) article_count!: number;

  @Column({ type: 'integer', default: 0 }) example_count!: number;

  @Column({ type: 'integer', default: 0 }) transition_count!: number; // distinctes

  @Column({ type: 'integer', default: 0 }) overflow_count!: number;

  @Column({ type: 'integer', default: 0 }) unmatched_count!: number;

  @CreateDateColumn() created_at!: Date;
}
