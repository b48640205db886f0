// src/notifications/plan-submission-email.ts
// Plain-text body of the mail sent when a user submits a plan.

export interface SubmittedPlan {
    id: string | number;
    version: number;
    name: string;
}

export interface PlanSubmission {
    userName: string;
    plan: SubmittedPlan;
    legislativeBody: string;
    /** Form fields as posted; repeated fields arrive as arrays */
    data: Record<string, string | readonly string[]>;
}

export function formatPlanSubmissionEmail(submission: PlanSubmission): string {
    const { userName, plan, legislativeBody, data } = submission;
    const lines = [
        'A plan has been submitted.',
        '',
        `User: ${userName}`,
        `Plan ID: ${plan.id}`,
        `Plan version: ${plan.version}`,
        `Plan name: ${plan.name}`,
        `Legislative body: ${legislativeBody}`,
        '',
        'Submitted data:'
    ];

    const keys = Object.keys(data).sort();
    if (keys.length === 0) {
        lines.push('(none)');
    }
    for (const key of keys) {
        const value = data[key];
        lines.push(`${key}: ${typeof value === 'string' ? value : value.join(', ')}`);
    }
    return lines.join('\n') + '\n';
}
