import { Column, Entity, PrimaryColumn, CreateDateColumn, ManyToOne, JoinColumn } from "typeorm";
import type { Question, QuestionSetMetadata } from "../../types/question";
import { CompetencyFrameworkEntity } from "./competency-framework.entity";

/**
 * QuestionSet Entity
 *
 * Interview questions with their rubrics, generated from one framework.
 * partial_coverage marks sets accepted with competencies left uncovered.
 */
@Entity({ name: "question_sets" })
export class QuestionSetEntity {
    @PrimaryColumn({
        type: "varchar",
        length: 64
    })
    id!: string;

    @Column({ name: "job_context_id", type: "varchar", length: 64 })
    jobContextId!: string;

    @Column({ name: "framework_id", type: "varchar", length: 64 })
    frameworkId!: string;

    @ManyToOne(() => CompetencyFrameworkEntity, { onDelete: "CASCADE" })
    @JoinColumn({ name: "framework_id" })
    framework!: CompetencyFrameworkEntity;

    @Column({
        type: "jsonb"
    })
    questions_json!: Question[];

    @Column({
        type: "jsonb"
    })
    metadata_json!: QuestionSetMetadata;

    @Column({
        type: "boolean",
        default: false
    })
    partial_coverage!: boolean;

    @Column({
        type: "jsonb",
        default: () => "'[]'"
    })
    uncovered_competency_ids!: string[];

    @CreateDateColumn({ name: "created_at" })
    created_at!: Date;
}
