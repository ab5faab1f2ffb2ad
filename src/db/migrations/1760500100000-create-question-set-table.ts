import { MigrationInterface, QueryRunner } from "typeorm";

export class CreateQuestionSetTable1760500100000 implements MigrationInterface {
    name = 'CreateQuestionSetTable1760500100000'

    public async up(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`CREATE TABLE "question_sets" ("id" character varying(64) NOT NULL, "job_context_id" character varying(64) NOT NULL, "framework_id" character varying(64) NOT NULL, "questions_json" jsonb NOT NULL, "metadata_json" jsonb NOT NULL, "partial_coverage" boolean NOT NULL DEFAULT false, "uncovered_competency_ids" jsonb NOT NULL DEFAULT '[]', "created_at" TIMESTAMP NOT NULL DEFAULT now(), CONSTRAINT "PK_question_sets_id" PRIMARY KEY ("id"))`);
        await queryRunner.query(`ALTER TABLE "question_sets" ADD CONSTRAINT "FK_question_sets_framework" FOREIGN KEY ("framework_id") REFERENCES "competency_frameworks"("id") ON DELETE CASCADE ON UPDATE NO ACTION`);
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`ALTER TABLE "question_sets" DROP CONSTRAINT "FK_question_sets_framework"`);
        await queryRunner.query(`DROP TABLE "question_sets"`);
    }

}
