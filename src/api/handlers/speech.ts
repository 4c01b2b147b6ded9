import type { Request, Response } from 'express';
import type { SpeechResponseData } from '../../types/api.js';
import type { SpeechPipelineInput, SpeechPipelineResult } from '../../types/speech.js';
import { sendError, sendMappedError, sendOk } from '../shared.js';

export interface SpeechDeps {
    pipeline: { process(input: SpeechPipelineInput): Promise<SpeechPipelineResult> };
}

function optionalString(value: unknown): string | undefined {
    return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

function optionalFlag(value: unknown): boolean | undefined {
    if (value === true || value === 'true') return true;
    if (value === false || value === 'false') return false;
    return undefined;
}

/**
 * Accepts either raw audio (`Content-Type: audio/*`, options in the query string) or JSON
 * `{ audio: <base64>, filename?, mimeType?, language?, voice?, synthesize?, playback? }`.
 */
export function parseSpeechInput(req: Request): SpeechPipelineInput | string {
    if (Buffer.isBuffer(req.body)) {
        const query = req.query;
        const mimeType = req.headers['content-type'];
        return {
            audio: req.body,
            filename: optionalString(query.filename) ?? 'audio.wav',
            ...(mimeType ? { mimeType } : {}),
            language: optionalString(query.language),
            voice: optionalString(query.voice),
            synthesize: optionalFlag(query.synthesize),
            playback: optionalFlag(query.playback),
        };
    }

    const body: unknown = req.body;
    if (typeof body !== 'object' || body === null || !('audio' in body) || typeof body.audio !== 'string') {
        return "Send raw audio with an audio/* content type, or JSON with a base64 'audio' field.";
    }
    const fields: Record<string, unknown> = { ...body };
    return {
        audio: Buffer.from(body.audio, 'base64'),
        filename: optionalString(fields.filename) ?? 'audio.wav',
        mimeType: optionalString(fields.mimeType),
        language: optionalString(fields.language),
        voice: optionalString(fields.voice),
        synthesize: optionalFlag(fields.synthesize),
        playback: optionalFlag(fields.playback),
    };
}

/** POST /speech — run one utterance through transcription, reasoning and synthesis. */
export function handleSpeech(deps: SpeechDeps) {
    return async (req: Request, res: Response): Promise<void> => {
        const input = parseSpeechInput(req);
        if (typeof input === 'string') {
            sendError(res, input, 400);
            return;
        }
        try {
            const result = await deps.pipeline.process(input);
            const data: SpeechResponseData = {
                requestId: result.requestId,
                transcript: result.transcript,
                response: result.response,
                audio: result.audio
                    ? {
                        base64: result.audio.data.toString('base64'),
                        mimeType: result.audio.mimeType,
                        backendId: result.audio.backendId,
                    }
                    : null,
                played: result.played,
                stages: result.stages,
            };
            sendOk(res, data);
        } catch (err) {
            sendMappedError(res, err);
        }
    };
}
