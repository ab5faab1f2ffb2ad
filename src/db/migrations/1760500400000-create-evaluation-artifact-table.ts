import { MigrationInterface, QueryRunner } from "typeorm";

export class CreateEvaluationArtifactTable1760500400000 implements MigrationInterface {
    name = 'CreateEvaluationArtifactTable1760500400000'

    public async up(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`CREATE TABLE "evaluation_artifacts" ("id" SERIAL NOT NULL, "evaluation_job_id" integer NOT NULL, "kind" character varying(30) NOT NULL, "key" character varying(100) NOT NULL DEFAULT '', "payload_json" jsonb NOT NULL, "version" character varying(20) NOT NULL DEFAULT '1.0', "created_at" TIMESTAMP NOT NULL DEFAULT now(), CONSTRAINT "PK_evaluation_artifacts_id" PRIMARY KEY ("id"))`);
        await queryRunner.query(`ALTER TABLE "evaluation_artifacts" ADD CONSTRAINT "FK_evaluation_artifacts_job" FOREIGN KEY ("evaluation_job_id") REFERENCES "evaluation_jobs"("id") ON DELETE CASCADE ON UPDATE NO ACTION`);
        await queryRunner.query(`CREATE INDEX "IDX_evaluation_artifacts_job_kind" ON "evaluation_artifacts" ("evaluation_job_id", "kind")`);
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`DROP INDEX "IDX_evaluation_artifacts_job_kind"`);
        await queryRunner.query(`ALTER TABLE "evaluation_artifacts" DROP CONSTRAINT "FK_evaluation_artifacts_job"`);
        await queryRunner.query(`DROP TABLE "evaluation_artifacts"`);
    }

}
