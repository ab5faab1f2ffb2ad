import { Column, Entity, PrimaryColumn, CreateDateColumn, ManyToOne, JoinColumn } from "typeorm";
import type { Competency } from "../../types/framework";
import { JobContextEntity } from "./job-context.entity";

/**
 * CompetencyFramework Entity
 *
 * Weighted competencies extracted from a job context. Keyed by job context
 * and template version; the latest row per job context is the active one.
 */
@Entity({ name: "competency_frameworks" })
export class CompetencyFrameworkEntity {
    @PrimaryColumn({
        type: "varchar",
        length: 64
    })
    id!: string;

    @Column({ name: "job_context_id", type: "varchar", length: 64 })
    jobContextId!: string;

    @ManyToOne(() => JobContextEntity, { onDelete: "CASCADE" })
    @JoinColumn({ name: "job_context_id" })
    jobContext!: JobContextEntity;

    @Column({
        type: "varchar",
        length: 20
    })
    template_version!: string;

    @Column({
        type: "jsonb"
    })
    competencies_json!: Competency[];

    @CreateDateColumn({ name: "created_at" })
    created_at!: Date;
}
