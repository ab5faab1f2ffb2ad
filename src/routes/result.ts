import { Router, Request, Response } from "express";
import { getEvaluationReportService } from "../services/evaluation-report.service";
import { sendError } from "./error-response";

const router = Router();

/**
 * GET /result/:answerId
 *
 * Status of the latest evaluation of an answer, with the report once it
 * has completed.
 */
router.get('/:answerId', async (req: Request, res: Response) => {
    try {
        const { job, report } = await getEvaluationReportService().getResult(req.params.answerId);

        // If job is still processing or queued, return status only
        if (job.status === 'queued' || job.status === 'processing') {
            return res.json({
                answerId: job.answerId,
                evaluationJobId: job.id,
                status: job.status
            });
        }

        if (job.status === 'failed') {
            return res.status(500).json({
                answerId: job.answerId,
                evaluationJobId: job.id,
                status: job.status,
                error_code: job.errorCode,
                attempts: job.attempts
            });
        }

        if (!report) {
            return res.status(500).json({
                error: 'Incomplete evaluation results'
            });
        }

        return res.json({
            answerId: job.answerId,
            evaluationJobId: job.id,
            status: job.status,
            report
        });
    } catch (error) {
        sendError(res, error, 'Result retrieval');
    }
});

export { router as resultRoutes };
