import { MigrationInterface, QueryRunner } from "typeorm";

export class CreateAnswerTable1760500200000 implements MigrationInterface {
    name = 'CreateAnswerTable1760500200000'

    public async up(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`CREATE TABLE "answers" ("id" character varying(64) NOT NULL, "question_set_id" character varying(64) NOT NULL, "question_id" character varying(64) NOT NULL, "candidate_id" character varying(128) NOT NULL, "text" text NOT NULL, "submitted_at" TIMESTAMP NOT NULL, CONSTRAINT "PK_answers_id" PRIMARY KEY ("id"))`);
        await queryRunner.query(`ALTER TABLE "answers" ADD CONSTRAINT "FK_answers_question_set" FOREIGN KEY ("question_set_id") REFERENCES "question_sets"("id") ON DELETE CASCADE ON UPDATE NO ACTION`);
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`ALTER TABLE "answers" DROP CONSTRAINT "FK_answers_question_set"`);
        await queryRunner.query(`DROP TABLE "answers"`);
    }

}
