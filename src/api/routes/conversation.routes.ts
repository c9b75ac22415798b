import { Router, Request, Response, NextFunction } from 'express';
import { body, matchedData } from 'express-validator';
import { validate } from '../middleware/validate';
import type { ConversationRenderer } from '../../services/conversation/ConversationRenderer';
import type { DialogueSegment, RenderFileResponse, RenderRequest } from '../../types';

const renderRequestRules = [
    body('topic_id').isString().withMessage('topic_id must be a string'),
    body('segments').isArray().withMessage('segments must be an array'),
    body('segments.*.speaker').isString().withMessage('speaker must be a string'),
    body('segments.*.text').isString().withMessage('text must be a string'),
];

function isDialogueSegment(value: unknown): value is DialogueSegment {
    return (
        typeof value === 'object' &&
        value !== null &&
        'speaker' in value &&
        typeof value.speaker === 'string' &&
        'text' in value &&
        typeof value.text === 'string'
    );
}

/** Only called after `renderRequestRules` passed. */
function toRenderRequest(req: Request): RenderRequest {
    const data = matchedData(req, { locations: ['body'] });
    const topicId: unknown = data.topic_id;
    const segments: unknown = data.segments;
    return {
        topic_id: typeof topicId === 'string' ? topicId : '',
        segments: Array.isArray(segments)
            ? segments.filter(isDialogueSegment).map(({ speaker, text }) => ({ speaker, text }))
            : [],
    };
}

export function createConversationRoutes(renderer: ConversationRenderer): Router {
    const router = Router();

    /** POST /render-conversation - Render the dialogue and return the MP3 bytes */
    router.post(
        '/',
        validate(renderRequestRules),
        async (req: Request, res: Response, next: NextFunction) => {
            try {
                const track = await renderer.render(toRenderRequest(req));
                res.set({
                    'Content-Type': track.contentType,
                    'Content-Length': String(track.audio.length),
                    'X-Audio-Duration-Ms': String(track.durationMs),
                });
                res.send(track.audio);
            } catch (e) {
                next(e);
            }
        }
    );

    /** POST /render-conversation/file - Render, save under the static directory, return its URL */
    router.post(
        '/file',
        validate(renderRequestRules),
        async (req: Request, res: Response, next: NextFunction) => {
            try {
                const saved = await renderer.renderToFile(toRenderRequest(req));
                const payload: RenderFileResponse = {
                    status: 'success',
                    audio_url: saved.audioUrl,
                    file_name: saved.fileName,
                    duration_ms: saved.durationMs,
                };
                res.json(payload);
            } catch (e) {
                next(e);
            }
        }
    );

    return router;
}
