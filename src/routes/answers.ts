import { Router, Request, Response } from "express";
import { z } from "zod";
import { errorFields, logger } from "../config/logger";
import { getQueueConfig } from "../queue/queue-config";
import { getEvaluationReportService } from "../services/evaluation-report.service";
import { sendError } from "./error-response";

const router = Router();

// Validation schema for answer submission
const answerSchema = z.object({
    id: z.string().trim().min(1).max(64).optional(),
    questionSetId: z.string().min(1, "Question set ID is required"),
    questionId: z.string().min(1, "Question ID is required"),
    candidateId: z.string().min(1, "Candidate ID is required").max(128),
    text: z.string()
});

/**
 * POST /answers
 *
 * Store a candidate answer and queue its evaluation.
 *
 * Returns: { answerId, evaluationJobId, status }
 */
router.post('/', async (req: Request, res: Response) => {
    try {
        const input = answerSchema.parse(req.body);
        const reports = getEvaluationReportService();
        const { answer, job } = await reports.submitAnswer(input);

        let status = job.status;
        try {
            await getQueueConfig().enqueueEvaluation({ evaluationJobId: job.id, answerId: answer.id });
            logger.info({ evaluationJobId: job.id, answerId: answer.id }, 'Evaluation job added to queue');
        } catch (error) {
            // Mark as failed if queue operation fails
            status = 'failed';
            await reports.markJob(job.id, { status, errorCode: 'queue_error' });
            logger.error({ evaluationJobId: job.id, ...errorFields(error) }, 'Failed to add job to queue');
        }

        res.status(202).json({
            answerId: answer.id,
            evaluationJobId: job.id,
            status
        });
    } catch (error) {
        sendError(res, error, 'Answer submission');
    }
});

export { router as answerRoutes };
