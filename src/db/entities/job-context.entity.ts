import { Column, Entity, PrimaryColumn, CreateDateColumn } from "typeorm";
import type { JobAttributes } from "../../types/job";

/**
 * JobContext Entity
 *
 * One row per distinct job description. The primary key is the content
 * fingerprint of the normalized description, so re-submitting the same
 * description resolves to the same row.
 */
@Entity({ name: "job_contexts" })
export class JobContextEntity {
    @PrimaryColumn({
        type: "varchar",
        length: 64
    })
    id!: string;

    @Column({
        type: "text"
    })
    description!: string;

    @Column({
        type: "jsonb"
    })
    attributes_json!: JobAttributes; // seniority, domain, company size, culture tags, family

    @CreateDateColumn({ name: "created_at" })
    created_at!: Date;
}
