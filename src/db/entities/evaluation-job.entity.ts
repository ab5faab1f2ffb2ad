import { Column, Entity, PrimaryGeneratedColumn, CreateDateColumn, UpdateDateColumn, ManyToOne, JoinColumn } from "typeorm";
import { AnswerEntity } from "./answer.entity";

export type EvaluationJobStatus = "queued" | "processing" | "completed" | "failed";

/**
 * EvaluationJob Entity
 *
 * Tracks one asynchronous evaluation of an answer.
 *
 * Lifecycle:
 * 1. Answer submitted → row created with status "queued"
 * 2. Worker picks it up → "processing"
 * 3. Report persisted → "completed"
 * 4. Any terminal error → "failed" with error_code
 *
 * attempts counts failed runs; the queue retries with exponential backoff.
 */
@Entity({ name: "evaluation_jobs" })
export class EvaluationJobEntity {
    @PrimaryGeneratedColumn()
    id!: number;

    @Column({ name: "answer_id", type: "varchar", length: 64 })
    answerId!: string;

    @ManyToOne(() => AnswerEntity, { onDelete: "CASCADE" })
    @JoinColumn({ name: "answer_id" })
    answer!: AnswerEntity;

    @Column({
        type: "varchar",
        length: 50,
        default: "queued"
    })
    status!: EvaluationJobStatus;

    @CreateDateColumn()
    created_at!: Date;

    @UpdateDateColumn()
    updated_at!: Date;

    @Column({
        type: "varchar",
        nullable: true
    })
    error_code!: string | null; // provider_error, evaluation_unavailable, ...

    @Column({
        type: "int",
        default: 0
    })
    attempts!: number;
}
