import type { FastifyReply } from 'fastify';
import {
  ArtifactNotFoundError,
  ComputationInvariantError,
  DocumentRenderError,
  ReportStorageError,
  TemplateError,
  ValidationError,
} from '../../utils/errors.js';

/**
 * Client input problems map to 4xx; invariant, render and storage failures
 * are server defects and map to 500 with their own codes.
 */
export function sendError(reply: FastifyReply, error: unknown): FastifyReply {
  if (error instanceof ValidationError) {
    return reply.code(400).send({ error: error.code, message: error.message, details: error.issues });
  }
  if (error instanceof TemplateError) {
    return reply.code(422).send({
      error: error.code,
      message: error.message,
      details: { placeholder: error.placeholder },
    });
  }
  if (error instanceof ArtifactNotFoundError) {
    return reply.code(404).send({ error: error.code, message: error.message });
  }
  if (
    error instanceof ComputationInvariantError ||
    error instanceof DocumentRenderError ||
    error instanceof ReportStorageError
  ) {
    return reply.code(500).send({ error: error.code, message: error.message });
  }

  return reply.code(500).send({
    error: 'INTERNAL_ERROR',
    message: error instanceof Error ? error.message : 'Unknown error',
  });
}
