import { MigrationInterface, QueryRunner } from "typeorm";

export class CreateEvaluationJobTable1760500300000 implements MigrationInterface {
    name = 'CreateEvaluationJobTable1760500300000'

    public async up(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`CREATE TABLE "evaluation_jobs" ("id" SERIAL NOT NULL, "answer_id" character varying(64) NOT NULL, "status" character varying(50) NOT NULL DEFAULT 'queued', "created_at" TIMESTAMP NOT NULL DEFAULT now(), "updated_at" TIMESTAMP NOT NULL DEFAULT now(), "error_code" character varying, "attempts" integer NOT NULL DEFAULT '0', CONSTRAINT "PK_evaluation_jobs_id" PRIMARY KEY ("id"))`);
        await queryRunner.query(`ALTER TABLE "evaluation_jobs" ADD CONSTRAINT "FK_evaluation_jobs_answer" FOREIGN KEY ("answer_id") REFERENCES "answers"("id") ON DELETE CASCADE ON UPDATE NO ACTION`);
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`ALTER TABLE "evaluation_jobs" DROP CONSTRAINT "FK_evaluation_jobs_answer"`);
        await queryRunner.query(`DROP TABLE "evaluation_jobs"`);
    }

}
