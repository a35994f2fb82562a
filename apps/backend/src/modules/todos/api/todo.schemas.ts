import { z } from 'zod';

/**
 * POST /todos body. Missing fields fall back to the zero values.
 */
export const createTodoSchema = z.object({
    title: z.string().default(''),
    description: z.string().default(''),
    completed: z.boolean().default(false),
    file_path: z.string().optional()
});

/**
 * PUT /todos/:uuid body. Every key except `completed` is stripped; an absent
 * `completed` means false.
 */
export const updateTodoSchema = z.object({
    completed: z.boolean().default(false)
});
