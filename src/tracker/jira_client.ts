import { z } from 'zod';
import { TrackerError } from './errors.js';
import {
    CreateTicketRequest,
    Ticket,
    TicketClient,
    TicketComment,
    Transition,
} from './types.js';
import { applyTicketFilter } from './jql.js';

export interface JiraClientOptions {
    baseUrl: string;
    /** Sent as `Authorization: Bearer <token>`. */
    token: string;
    storyPointsFieldId: string;
    ticketFilter?: string;
}

const NamedSchema = z.object({ name: z.string() });

const IssueFieldsSchema = z.object({
    summary: z.string().nullish(),
    description: z.string().nullish(),
    status: NamedSchema.nullish(),
    issuetype: NamedSchema.nullish(),
    priority: NamedSchema.nullish(),
    assignee: z.object({ displayName: z.string() }).nullish(),
    components: z.array(NamedSchema).nullish(),
});

const IssueSchema = z.object({
    key: z.string(),
    fields: z.record(z.string(), z.unknown()),
});

const SearchResponseSchema = z.object({
    issues: z.array(IssueSchema),
});

const CreateResponseSchema = z.object({ key: z.string() });

const TransitionsResponseSchema = z.object({
    transitions: z.array(z.object({
        id: z.string(),
        name: z.string(),
        to: NamedSchema,
    })),
});

const CommentsResponseSchema = z.object({
    comments: z.array(z.object({
        id: z.string(),
        body: z.string().nullish(),
        created: z.string().nullish(),
        author: z.object({ displayName: z.string() }).nullish(),
    })),
});

const FieldListSchema = z.array(z.object({
    id: z.string(),
    name: z.string(),
    schema: z.object({ type: z.string().optional(), custom: z.string().optional() }).nullish(),
}));

const ApiErrorSchema = z.object({
    errorMessages: z.array(z.string()).optional(),
    errors: z.record(z.string(), z.string()).optional(),
});

type IssuePayload = z.infer<typeof IssueSchema>;

interface RequestOptions {
    body?: unknown;
    params?: Record<string, string>;
    /** Used to word 404 errors. */
    ticketKey?: string;
}

/**
 * Issue tracker client over the REST v2 API.
 */
export class JiraTicketClient implements TicketClient {
    private readonly baseUrl: string;

    constructor(private readonly options: JiraClientOptions) {
        this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    }

    private buildUrl(path: string, params?: Record<string, string>): string {
        const url = new URL(this.baseUrl + path);
        for (const [name, value] of Object.entries(params ?? {})) {
            url.searchParams.set(name, value);
        }
        return url.toString();
    }

    private async send(method: string, path: string, options: RequestOptions = {}): Promise<string> {
        const headers: Record<string, string> = {
            Accept: 'application/json',
            Authorization: `Bearer ${this.options.token}`,
        };
        if (options.body !== undefined) {
            headers['Content-Type'] = 'application/json';
        }

        let response: Response;
        try {
            response = await fetch(this.buildUrl(path, options.params), {
                method,
                headers,
                body: options.body === undefined ? undefined : JSON.stringify(options.body),
            });
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new TrackerError(`Failed to reach the issue tracker: ${message}`, undefined, error);
        }

        const text = await response.text();
        if (!response.ok) {
            throw this.describeFailure(response.status, response.statusText, text, options.ticketKey);
        }
        return text;
    }

    private async request<S extends z.ZodTypeAny>(
        method: string,
        path: string,
        schema: S,
        options: RequestOptions = {}
    ): Promise<z.infer<S>> {
        const text = await this.send(method, path, options);
        let json: unknown;
        try {
            json = JSON.parse(text);
        } catch (error) {
            throw new TrackerError(`Failed to parse response from ${path}`, undefined, error);
        }
        const parsed = schema.safeParse(json);
        if (!parsed.success) {
            throw new TrackerError(`Unexpected response from ${path}: ${parsed.error.message}`, undefined, parsed.error);
        }
        return parsed.data;
    }

    private describeFailure(status: number, statusText: string, body: string, ticketKey?: string): TrackerError {
        if (status === 401 || status === 403) {
            return new TrackerError(
                'authentication failed. Your issue tracker token may be invalid (JIRA_API_TOKEN)',
                status
            );
        }
        if (status === 404 && ticketKey) {
            return new TrackerError(`ticket ${ticketKey} not found`, status);
        }
        if (status === 400) {
            const details = extractApiErrors(body);
            if (details) {
                const hint = details.includes(this.options.storyPointsFieldId)
                    ? `\nnote: the story points field ID (${this.options.storyPointsFieldId}) may be incorrect; set story_points_field_id in config.yaml`
                    : '';
                return new TrackerError(`Issue tracker API error: ${details}${hint}`, status);
            }
        }
        const suffix = body ? ` - ${body.slice(0, 500)}` : '';
        return new TrackerError(`Issue tracker returned error: ${status} ${statusText}${suffix}`, status);
    }

    private toTicket(issue: IssuePayload): Ticket {
        const parsed = IssueFieldsSchema.safeParse(issue.fields);
        if (!parsed.success) {
            throw new TrackerError(`Unexpected fields on ${issue.key}: ${parsed.error.message}`, undefined, parsed.error);
        }
        const fields = parsed.data;
        const points = issue.fields[this.options.storyPointsFieldId];

        return {
            key: issue.key,
            summary: fields.summary ?? '',
            description: fields.description ?? '',
            status: fields.status?.name ?? '',
            issueType: fields.issuetype?.name ?? '',
            priority: fields.priority?.name,
            assignee: fields.assignee?.displayName,
            storyPoints: typeof points === 'number' ? points : 0,
            components: (fields.components ?? []).map(c => c.name),
        };
    }

    async getTicket(key: string): Promise<Ticket> {
        const issue = await this.request('GET', `/rest/api/2/issue/${encodeURIComponent(key)}`, IssueSchema, {
            ticketKey: key,
        });
        return this.toTicket(issue);
    }

    async searchTickets(jql: string): Promise<Ticket[]> {
        const response = await this.request('GET', '/rest/api/2/search', SearchResponseSchema, {
            params: {
                jql: applyTicketFilter(jql, this.options.ticketFilter),
                fields: `summary,description,status,issuetype,priority,assignee,${this.options.storyPointsFieldId},components`,
                maxResults: '1000',
            },
        });
        return response.issues.map(issue => this.toTicket(issue));
    }

    async createTicket(request: CreateTicketRequest): Promise<string> {
        const fields: Record<string, unknown> = {
            project: { key: request.project },
            summary: request.summary,
            issuetype: { name: request.issueType },
        };
        if (request.epicLink) {
            fields[request.epicLink.fieldId] = request.epicLink.epicKey;
        } else if (request.parentKey) {
            fields.parent = { key: request.parentKey };
        }

        const created = await this.request('POST', '/rest/api/2/issue', CreateResponseSchema, {
            body: { fields },
        });
        return created.key;
    }

    async updateDescription(key: string, description: string): Promise<void> {
        await this.send('PUT', `/rest/api/2/issue/${encodeURIComponent(key)}`, {
            body: { fields: { description } },
            ticketKey: key,
        });
    }

    async updateStoryPoints(key: string, points: number): Promise<void> {
        await this.send('PUT', `/rest/api/2/issue/${encodeURIComponent(key)}`, {
            body: { fields: { [this.options.storyPointsFieldId]: points } },
            ticketKey: key,
        });
    }

    async getTransitions(key: string): Promise<Transition[]> {
        const response = await this.request(
            'GET',
            `/rest/api/2/issue/${encodeURIComponent(key)}/transitions`,
            TransitionsResponseSchema,
            { ticketKey: key }
        );
        return response.transitions.map(t => ({ id: t.id, name: t.name, toStatus: t.to.name }));
    }

    async transition(key: string, transitionId: string): Promise<void> {
        await this.send('POST', `/rest/api/2/issue/${encodeURIComponent(key)}/transitions`, {
            body: { transition: { id: transitionId } },
            ticketKey: key,
        });
    }

    async getComments(key: string): Promise<TicketComment[]> {
        const response = await this.request(
            'GET',
            `/rest/api/2/issue/${encodeURIComponent(key)}/comment`,
            CommentsResponseSchema,
            { ticketKey: key }
        );
        return response.comments.map(c => ({
            id: c.id,
            author: c.author?.displayName ?? 'unknown',
            created: c.created ?? '',
            body: c.body ?? '',
        }));
    }

    async detectEpicLinkField(): Promise<string | undefined> {
        const fields = await this.request('GET', '/rest/api/2/field', FieldListSchema);
        const match = fields.find(field => {
            if (!field.id.startsWith('customfield_')) return false;
            const type = `${field.schema?.type ?? ''} ${field.schema?.custom ?? ''}`.toLowerCase();
            return field.name.toLowerCase().includes('epic link') || type.includes('epic');
        });
        return match?.id;
    }
}

function extractApiErrors(body: string): string | undefined {
    let json: unknown;
    try {
        json = JSON.parse(body);
    } catch {
        return undefined;
    }
    const parsed = ApiErrorSchema.safeParse(json);
    if (!parsed.success) return undefined;

    const messages = [
        ...(parsed.data.errorMessages ?? []),
        ...Object.entries(parsed.data.errors ?? {}).map(([field, message]) => `${field}: ${message}`),
    ];
    return messages.length > 0 ? messages.join('; ') : undefined;
}
