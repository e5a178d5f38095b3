/**
 * Outlook mail operations.
 */

import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import { parseArgs } from "node:util";

import { parsePositiveInt, requireOption, splitList, OperationArgumentError, type Operation } from "../pipeline/index.js";
import { createObjectList, type DataRecord } from "../records/index.js";
import type { GraphClient, QueryParams } from "./client.js";
import {
  DEFAULT_TOP,
  defineGraphOperation,
  messageById,
  parseOptions,
  recipients,
  requireStringField,
  segment,
  stringField,
  throwIfCancelled,
} from "./operation.js";
import { AttachmentSchema, MessageSchema, parseResource, type Message } from "./schemas.js";
import type { GraphSession } from "./session.js";

const MESSAGE_FIELDS = ["id", "subject", "from", "receivedDateTime", "hasAttachments", "webLink"];
const ATTACHMENT_FIELDS = ["id", "name", "contentType", "size"];
const PAGE_SIZE = 100;

// ============================================================
// Helpers
// ============================================================

function searchTerm(query: string): string {
  return `"${query.replace(/"/g, '\\"')}"`;
}

/**
 * `$search` and `$orderby` cannot be combined, so a query keeps Graph's
 * relevance order and no query lists the newest messages first.
 */
function messageQuery(query: string | undefined, top: number, filter?: string): QueryParams {
  const params: Record<string, string | number> = {
    $top: Math.min(top, PAGE_SIZE),
    $select: MESSAGE_FIELDS.join(","),
  };
  if (query !== undefined) {
    params.$search = searchTerm(query);
  } else {
    params.$orderby = "receivedDateTime desc";
    if (filter !== undefined) params.$filter = filter;
  }
  return params;
}

async function searchMessages(
  client: GraphClient,
  query: string | undefined,
  top: number,
  filter?: string
): Promise<Message[]> {
  const items = await client.listAll("/messages", messageQuery(query, top, filter), top);
  return items.map((item) => parseResource(MessageSchema, item, "message"));
}

function messageRecord(message: Message): DataRecord {
  return {
    id: message.id,
    subject: message.subject ?? null,
    from: message.from?.emailAddress.address ?? null,
    receivedDateTime: message.receivedDateTime ?? null,
    hasAttachments: message.hasAttachments ?? false,
    webLink: message.webLink ?? null,
  };
}

interface SearchParams {
  query?: string;
  top: number;
}

function parseSearch(operation: string, args: readonly string[]): SearchParams {
  const { values } = parseOptions(operation, () =>
    parseArgs({
      args: [...args],
      options: {
        query: { type: "string" },
        top: { type: "string" },
      },
      strict: true,
      allowPositionals: false,
    })
  );
  return {
    query: values.query !== undefined && values.query.trim() !== "" ? values.query : undefined,
    top: parsePositiveInt(values.top, "top", DEFAULT_TOP),
  };
}

// ============================================================
// Operations
// ============================================================

export function searchEmails(session: GraphSession): Operation {
  return defineGraphOperation<SearchParams>(session, {
    name: "search_emails",
    summary: "search the mailbox; newest messages when no query is given",
    usage: "search_emails [--query TEXT] [--top N]",
    input: "none",
    parse: (args) => parseSearch("search_emails", args),
    async execute(client, params, _input, ctx) {
      const messages = await searchMessages(client, params.query, params.top);
      ctx.logger.info("Messages found", { query: params.query ?? null, count: messages.length });
      return createObjectList(messages.map(messageRecord));
    },
  });
}

interface SendParams {
  to: string[];
  cc: string[];
  subject: string;
  body: string;
  attachments: string[];
}

export function sendEmail(session: GraphSession): Operation {
  return defineGraphOperation<SendParams>(session, {
    name: "send_email",
    summary: "compose and send one email, optionally with file attachments",
    usage: "send_email --to A[,B] --subject TEXT [--body TEXT] [--cc C[,D]] [--attachment FILE[,FILE]]",
    input: "none",
    parse(args) {
      const { values } = parseOptions("send_email", () =>
        parseArgs({
          args: [...args],
          options: {
            to: { type: "string" },
            cc: { type: "string" },
            subject: { type: "string" },
            body: { type: "string" },
            attachment: { type: "string" },
          },
          strict: true,
          allowPositionals: false,
        })
      );
      const to = splitList(requireOption(values.to, "to"));
      if (to.length === 0) {
        throw new OperationArgumentError("--to needs at least one address");
      }
      return {
        to,
        cc: splitList(values.cc),
        subject: requireOption(values.subject, "subject"),
        body: values.body ?? "",
        attachments: splitList(values.attachment),
      };
    },
    async execute(client, params, _input, ctx) {
      // Created as a draft first so attachments can be added before sending
      const draft = parseResource(
        MessageSchema,
        await client.post("/messages", {
          subject: params.subject,
          body: { contentType: "Text", content: params.body },
          toRecipients: recipients(params.to),
          ccRecipients: recipients(params.cc),
        }),
        "message"
      );

      for (const file of params.attachments) {
        const data = await readFile(file);
        await client.post(`${messageById(draft.id)}/attachments`, {
          "@odata.type": "#microsoft.graph.fileAttachment",
          name: basename(file),
          contentBytes: data.toString("base64"),
        });
      }

      await client.post(`${messageById(draft.id)}/send`);
      ctx.logger.info("Email sent", { id: draft.id, to: params.to, attachments: params.attachments.length });

      return createObjectList([
        { id: draft.id, subject: params.subject, to: params.to, cc: params.cc, sent: true },
      ]);
    },
  });
}

export function replyEmails(session: GraphSession): Operation {
  return defineGraphOperation<{ body: string }>(session, {
    name: "reply_emails",
    summary: "reply to every email in the input list",
    usage: "reply_emails --body TEXT",
    input: "required",
    parse(args) {
      const { values } = parseOptions("reply_emails", () =>
        parseArgs({ args: [...args], options: { body: { type: "string" } }, strict: true, allowPositionals: false })
      );
      return { body: requireOption(values.body, "body") };
    },
    async execute(client, params, input = [], ctx) {
      const replies: DataRecord[] = [];
      for (const [index, record] of input.entries()) {
        throwIfCancelled(ctx, "reply_emails", replies);
        const id = requireStringField(record, "id", index, "reply_emails");
        await client.post(`${messageById(id)}/reply`, { comment: params.body });
        replies.push({ id, action: "reply" });
      }
      return createObjectList(replies);
    },
  });
}

export function forwardEmails(session: GraphSession): Operation {
  return defineGraphOperation<{ to: string[]; comment: string }>(session, {
    name: "forward_emails",
    summary: "forward every email in the input list",
    usage: "forward_emails --to A[,B] [--comment TEXT]",
    input: "required",
    parse(args) {
      const { values } = parseOptions("forward_emails", () =>
        parseArgs({
          args: [...args],
          options: { to: { type: "string" }, comment: { type: "string" } },
          strict: true,
          allowPositionals: false,
        })
      );
      const to = splitList(requireOption(values.to, "to"));
      if (to.length === 0) {
        throw new OperationArgumentError("--to needs at least one address");
      }
      return { to, comment: values.comment ?? "" };
    },
    async execute(client, params, input = [], ctx) {
      const forwards: DataRecord[] = [];
      for (const [index, record] of input.entries()) {
        throwIfCancelled(ctx, "forward_emails", forwards);
        const id = requireStringField(record, "id", index, "forward_emails");
        await client.post(`${messageById(id)}/forward`, {
          comment: params.comment,
          toRecipients: recipients(params.to),
        });
        forwards.push({ id, action: "forward", to: params.to });
      }
      return createObjectList(forwards);
    },
  });
}

function parseDestination(operation: string, args: readonly string[]): { dst?: string } {
  const { values } = parseOptions(operation, () =>
    parseArgs({ args: [...args], options: { dst: { type: "string" } }, strict: true, allowPositionals: false })
  );
  return values.dst !== undefined && values.dst.trim() !== "" ? { dst: values.dst } : {};
}

export function saveEmails(session: GraphSession): Operation {
  return defineGraphOperation<{ dst?: string }>(session, {
    name: "save_emails",
    summary: "save every email in the input list as a MIME .eml file",
    usage: "save_emails [--dst DIR]",
    input: "required",
    parse: (args) => parseDestination("save_emails", args),
    async execute(client, params, input = [], ctx) {
      const saved: DataRecord[] = [];
      for (const [index, record] of input.entries()) {
        throwIfCancelled(ctx, "save_emails", saved);
        const id = requireStringField(record, "id", index, "save_emails");
        const subject = stringField(record, "subject");
        const mime = await client.getBinary(`${messageById(id)}/$value`);
        const content = await ctx.blobs.put(`${subject ?? id}.eml`, mime.data, "message/rfc822", params.dst);
        saved.push({ id, subject: subject ?? null, path: content.$blob, content });
      }
      ctx.logger.info("Emails saved", { count: saved.length, dst: params.dst ?? ctx.blobs.directory });
      return createObjectList(saved);
    },
  });
}

export function searchAttachments(session: GraphSession): Operation {
  return defineGraphOperation<SearchParams>(session, {
    name: "search_attachments",
    summary: "list attachments of messages matching a query",
    usage: "search_attachments [--query TEXT] [--top N]",
    input: "none",
    parse: (args) => parseSearch("search_attachments", args),
    async execute(client, params, _input, ctx) {
      const messages = await searchMessages(client, params.query, params.top, "hasAttachments eq true");
      const found: DataRecord[] = [];

      for (const message of messages) {
        if (found.length >= params.top) break;
        if (message.hasAttachments === false) continue;
        throwIfCancelled(ctx, "search_attachments", found);

        const attachments = await client.listAll(
          `${messageById(message.id)}/attachments`,
          { $select: ATTACHMENT_FIELDS.join(",") },
          params.top - found.length
        );
        for (const item of attachments) {
          const attachment = parseResource(AttachmentSchema, item, "attachment");
          found.push({
            id: attachment.id,
            messageId: message.id,
            name: attachment.name ?? null,
            contentType: attachment.contentType ?? null,
            size: attachment.size ?? null,
          });
        }
      }

      ctx.logger.info("Attachments found", { query: params.query ?? null, count: found.length });
      return createObjectList(found);
    },
  });
}

export function saveAttachments(session: GraphSession): Operation {
  return defineGraphOperation<{ dst?: string }>(session, {
    name: "save_attachments",
    summary: "save every attachment in the input list to disk",
    usage: "save_attachments [--dst DIR]",
    input: "required",
    parse: (args) => parseDestination("save_attachments", args),
    async execute(client, params, input = [], ctx) {
      const saved: DataRecord[] = [];
      for (const [index, record] of input.entries()) {
        throwIfCancelled(ctx, "save_attachments", saved);
        const id = requireStringField(record, "id", index, "save_attachments");
        const messageId = requireStringField(record, "messageId", index, "save_attachments");
        const name = stringField(record, "name") ?? id;
        const file = await client.getBinary(`${messageById(messageId)}/attachments/${segment(id)}/$value`);
        const content = await ctx.blobs.put(
          name,
          file.data,
          stringField(record, "contentType") ?? file.contentType,
          params.dst
        );
        saved.push({ id, messageId, name, path: content.$blob, content });
      }
      ctx.logger.info("Attachments saved", { count: saved.length, dst: params.dst ?? ctx.blobs.directory });
      return createObjectList(saved);
    },
  });
}

export function outlookOperations(session: GraphSession): Operation[] {
  return [
    searchEmails(session),
    sendEmail(session),
    replyEmails(session),
    forwardEmails(session),
    saveEmails(session),
    searchAttachments(session),
    saveAttachments(session),
  ];
}
