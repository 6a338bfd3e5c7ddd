import { z } from 'zod';
import { MalformedCandidateError, MalformedOfferError } from '../lib/errors.js';
import type { IceCandidateInit, SessionDescription } from './types.js';

export const offerSchema = z.object({
  sdp: z.string(),
  type: z.literal('offer'),
});

export const candidateSchema = z.object({
  candidate: z.string(),
  sdpMid: z.string().nullable(),
  sdpMLineIndex: z.number().int().nonnegative().nullable().optional(),
});

export function parseOffer(raw: unknown): SessionDescription {
  const result = offerSchema.safeParse(raw);
  if (!result.success) {
    throw new MalformedOfferError('Offer must be an object with a string "sdp" and type "offer"');
  }
  return result.data;
}

export type CandidateParse =
  | { ok: true; candidate: IceCandidateInit }
  | { ok: false; error: MalformedCandidateError };

/** Never throws: a malformed candidate is an expected network condition. */
export function parseCandidate(raw: unknown): CandidateParse {
  if (typeof raw !== 'object' || raw === null || !('candidate' in raw)) {
    return { ok: false, error: new MalformedCandidateError('message has no "candidate" key') };
  }
  const payload: unknown = raw.candidate;
  if (payload === null || payload === undefined) {
    return { ok: false, error: new MalformedCandidateError('candidate is null') };
  }
  if (typeof payload !== 'object' || Array.isArray(payload)) {
    return { ok: false, error: new MalformedCandidateError(`candidate is a ${typeof payload}, not an object`) };
  }
  const candidate = candidateSchema.safeParse(payload);
  if (!candidate.success) {
    const fields = candidate.error.issues.map((issue) => issue.path.join('.')).join(', ');
    return { ok: false, error: new MalformedCandidateError(`candidate has invalid fields: ${fields}`) };
  }
  return { ok: true, candidate: candidate.data };
}
