import type { FastifyInstance, FastifyRequest } from 'fastify';
import { parseItemForm } from '../services/item-form';
import type { UploadedImage } from '../services/item-form';
import { createItem } from '../services/item-creation';
import type { CreateItemDeps, CreateItemFailureKind } from '../services/item-creation';

const FAILURE_STATUS: Record<CreateItemFailureKind, number> = {
  file_write_failed: 500,
  storage_failed: 500,
};

async function readItemForm(req: FastifyRequest) {
  const fields: Record<string, string> = {};
  let image: UploadedImage | undefined;
  for await (const part of req.parts()) {
    if (part.type === 'file') {
      // Every file stream has to be drained, even the ones we ignore.
      const content = await part.toBuffer();
      if (part.fieldname === 'image') {
        image = { filename: part.filename, content };
      }
    } else if (typeof part.value === 'string') {
      fields[part.fieldname] = part.value;
    }
  }
  return { fields, image };
}

// Upload limits (413) keep their status; any other parser failure means a malformed body.
const isPayloadTooLarge = (err: unknown) =>
  typeof err === 'object' && err !== null && 'statusCode' in err && err.statusCode === 413;

export async function itemRoutes(fastify: FastifyInstance, deps: CreateItemDeps) {
  // Create item from a multipart form (metadata + image)
  fastify.post('/items', async (req, reply) => {
    if (!req.isMultipart()) {
      return reply.code(400).send({
        error: 'Invalid item form',
        detail: [{ field: 'body', message: 'expected multipart/form-data' }],
      });
    }

    let form: Awaited<ReturnType<typeof readItemForm>>;
    try {
      form = await readItemForm(req);
    } catch (err) {
      if (isPayloadTooLarge(err)) throw err;
      const message = err instanceof Error ? err.message : String(err);
      req.log.info({ reqId: req.id, err }, 'malformed multipart body');
      return reply.code(400).send({ error: 'Invalid item form', detail: [{ field: 'body', message }] });
    }
    const { fields, image } = form;
    const parsed = parseItemForm(fields, image);
    if (!parsed.ok) {
      req.log.info({ reqId: req.id, issues: parsed.issues }, 'item form rejected');
      return reply.code(400).send({ error: 'Invalid item form', detail: parsed.issues });
    }

    const result = await createItem(parsed.input, deps);
    if (!result.ok) {
      req.log.error({ reqId: req.id, kind: result.kind, err: result.cause }, 'failed to create item');
      return reply.code(FAILURE_STATUS[result.kind]).send({ error: result.message });
    }

    req.log.info({ reqId: req.id, itemId: result.item.id, imageUrl: result.item.image_url }, 'item created');
    return result.item;
  });
}
