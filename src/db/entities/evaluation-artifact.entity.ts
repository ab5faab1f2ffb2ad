import { Column, Entity, PrimaryGeneratedColumn, CreateDateColumn, ManyToOne, JoinColumn } from "typeorm";
import { EvaluationJobEntity } from "./evaluation-job.entity";

export type ArtifactKind = "dimension_score" | "composite" | "percentile" | "explanation" | "report";

/**
 * EvaluationArtifact Entity
 *
 * Outputs of one evaluation job. `key` distinguishes artifacts of the same
 * kind (the competency id for dimension scores and percentiles, empty
 * otherwise).
 */
@Entity({ name: "evaluation_artifacts" })
export class EvaluationArtifactEntity {
    @PrimaryGeneratedColumn()
    id!: number;

    @Column({ name: "evaluation_job_id", type: "int" })
    evaluationJobId!: number;

    @ManyToOne(() => EvaluationJobEntity, { onDelete: "CASCADE" })
    @JoinColumn({ name: "evaluation_job_id" })
    evaluationJob!: EvaluationJobEntity;

    @Column({
        type: "varchar",
        length: 30
    })
    kind!: ArtifactKind;

    @Column({
        type: "varchar",
        length: 100,
        default: ""
    })
    key!: string;

    @Column({
        type: "jsonb"
    })
    payload_json!: object;

    @Column({
        type: "varchar",
        length: 20,
        default: "1.0"
    })
    version!: string; // Evaluation logic version for reproducibility

    @CreateDateColumn({ name: "created_at" })
    created_at!: Date;
}
