import { Column, Entity, PrimaryColumn, ManyToOne, JoinColumn } from "typeorm";
import { QuestionSetEntity } from "./question-set.entity";

/**
 * Answer Entity
 *
 * A candidate's free-text answer to one question of a question set.
 */
@Entity({ name: "answers" })
export class AnswerEntity {
    @PrimaryColumn({
        type: "varchar",
        length: 64
    })
    id!: string;

    @Column({ name: "question_set_id", type: "varchar", length: 64 })
    questionSetId!: string;

    @ManyToOne(() => QuestionSetEntity, { onDelete: "CASCADE" })
    @JoinColumn({ name: "question_set_id" })
    questionSet!: QuestionSetEntity;

    @Column({
        type: "varchar",
        length: 64
    })
    question_id!: string;

    @Column({
        type: "varchar",
        length: 128
    })
    candidate_id!: string;

    @Column({
        type: "text"
    })
    text!: string;

    @Column({
        type: "timestamp"
    })
    submitted_at!: Date;
}
