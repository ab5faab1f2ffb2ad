import { MigrationInterface, QueryRunner } from "typeorm";

export class CreateJobContextTables1760500000000 implements MigrationInterface {
    name = 'CreateJobContextTables1760500000000'

    public async up(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`CREATE TABLE "job_contexts" ("id" character varying(64) NOT NULL, "description" text NOT NULL, "attributes_json" jsonb NOT NULL, "created_at" TIMESTAMP NOT NULL DEFAULT now(), CONSTRAINT "PK_job_contexts_id" PRIMARY KEY ("id"))`);
        await queryRunner.query(`CREATE TABLE "competency_frameworks" ("id" character varying(64) NOT NULL, "job_context_id" character varying(64) NOT NULL, "template_version" character varying(20) NOT NULL, "competencies_json" jsonb NOT NULL, "created_at" TIMESTAMP NOT NULL DEFAULT now(), CONSTRAINT "PK_competency_frameworks_id" PRIMARY KEY ("id"))`);
        await queryRunner.query(`ALTER TABLE "competency_frameworks" ADD CONSTRAINT "FK_competency_frameworks_job_context" FOREIGN KEY ("job_context_id") REFERENCES "job_contexts"("id") ON DELETE CASCADE ON UPDATE NO ACTION`);
        await queryRunner.query(`CREATE INDEX "IDX_competency_frameworks_job_context" ON "competency_frameworks" ("job_context_id", "created_at")`);
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`DROP INDEX "IDX_competency_frameworks_job_context"`);
        await queryRunner.query(`ALTER TABLE "competency_frameworks" DROP CONSTRAINT "FK_competency_frameworks_job_context"`);
        await queryRunner.query(`DROP TABLE "competency_frameworks"`);
        await queryRunner.query(`DROP TABLE "job_contexts"`);
    }

}
