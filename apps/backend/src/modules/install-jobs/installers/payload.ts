import type { z } from 'zod';
import { ValidationError } from '../../../lib/errors.js';

export function parsePayload<TSchema extends z.ZodTypeAny>(schema: TSchema, payload: unknown, installType: string): z.infer<TSchema> {
    const result = schema.safeParse(payload);
    if (!result.success) {
        const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
        throw new ValidationError(`Invalid ${installType} install payload: ${issues.join('; ')}`, { issues });
    }
    return result.data;
}
