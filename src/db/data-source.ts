import "reflect-metadata";
import * as path from "path";
import { DataSource } from "typeorm";
import { getSettings } from "../config/settings";
import { JobContextEntity } from "./entities/job-context.entity";
import { CompetencyFrameworkEntity } from "./entities/competency-framework.entity";
import { QuestionSetEntity } from "./entities/question-set.entity";
import { AnswerEntity } from "./entities/answer.entity";
import { EvaluationJobEntity } from "./entities/evaluation-job.entity";
import { EvaluationArtifactEntity } from "./entities/evaluation-artifact.entity";

const settings = getSettings();

export const AppDataSource = new DataSource({
    type: "postgres",
    url: settings.DATABASE_URL,
    synchronize: false,
    logging: settings.NODE_ENV === 'development',
    entities: [
        JobContextEntity,
        CompetencyFrameworkEntity,
        QuestionSetEntity,
        AnswerEntity,
        EvaluationJobEntity,
        EvaluationArtifactEntity
    ],
    migrations: [path.join(__dirname, "migrations", "*.{ts,js}")],
});
