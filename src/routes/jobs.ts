import { Router, Request, Response } from "express";
import { z } from "zod";
import { getEvaluationReportService } from "../services/evaluation-report.service";
import { SENIORITY_LEVELS } from "../types/job";
import { sendError } from "./error-response";

const router = Router();

// Validation schema for job context creation
const createJobSchema = z.object({
    description: z.string().trim().min(1, "Job description is required"),
    attributes: z.object({
        seniority: z.enum(SENIORITY_LEVELS),
        domain: z.string().trim().min(1, "Domain is required"),
        companySize: z.string().optional(),
        cultureTags: z.array(z.string()).default([]),
        family: z.string().optional()
    })
});

const generationOptionsSchema = z.object({
    subjectId: z.string().optional(),
    experimentId: z.string().optional(),
    templateVersion: z.string().optional()
});

const questionsSchema = generationOptionsSchema.extend({
    allowPartial: z.boolean().default(false),
    frameworkId: z.string().optional()
});

/**
 * POST /jobs
 *
 * Register a job description. Identical descriptions resolve to the same
 * job context.
 *
 * Body: { description, attributes: { seniority, domain, companySize?, cultureTags?, family? } }
 */
router.post('/', async (req: Request, res: Response) => {
    try {
        const input = createJobSchema.parse(req.body);
        const jobContext = await getEvaluationReportService().createJobContext(input);
        res.status(201).json(jobContext);
    } catch (error) {
        sendError(res, error, 'Job context creation');
    }
});

/**
 * POST /jobs/:id/framework
 *
 * Generate (or fetch from cache) the competency framework for a job context.
 */
router.post('/:id/framework', async (req: Request, res: Response) => {
    try {
        const options = generationOptionsSchema.parse(req.body ?? {});
        const framework = await getEvaluationReportService().buildFramework(req.params.id, options);
        res.json(framework);
    } catch (error) {
        sendError(res, error, 'Framework generation');
    }
});

/**
 * POST /jobs/:id/questions
 *
 * Generate the question set for the job context's latest framework.
 * Returns 409 with the partial set when coverage is incomplete and
 * allowPartial is false.
 */
router.post('/:id/questions', async (req: Request, res: Response) => {
    try {
        const options = questionsSchema.parse(req.body ?? {});
        const questionSet = await getEvaluationReportService().buildQuestionSet(req.params.id, options);
        res.json(questionSet);
    } catch (error) {
        sendError(res, error, 'Question generation');
    }
});

export { router as jobRoutes };
