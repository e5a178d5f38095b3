/**
 * OneDrive file operations.
 */

import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import { parseArgs } from "node:util";

import { OperationArgumentError, parsePositiveInt, requireOption, splitList, type Operation } from "../pipeline/index.js";
import { createObjectList, type DataRecord, type ObjectList } from "../records/index.js";
import {
  DEFAULT_TOP,
  defineGraphOperation,
  driveItemById,
  driveItemByPath,
  idsFrom,
  parseOptions,
  pathSegments,
  requireItemsOrInput,
  requireStringField,
  throwIfCancelled,
} from "./operation.js";
import { DriveItemSchema, parseResource, type DriveItem } from "./schemas.js";
import type { GraphSession } from "./session.js";

const ITEM_FIELDS = ["id", "name", "size", "webUrl", "folder", "parentReference"];
const PAGE_SIZE = 200;

/**
 * "/drive/root:/Documents/2024" -> "/Documents/2024"; the root itself -> "/".
 */
export function relativeParentPath(path: string | null | undefined): string | null {
  if (path === null || path === undefined) return null;
  const relative = path.replace(/^\/drive\/root:?/, "");
  return relative === "" ? "/" : decodeURIComponent(relative);
}

function fileRecord(item: DriveItem): DataRecord {
  return {
    id: item.id,
    name: item.name,
    size: item.size ?? null,
    webUrl: item.webUrl ?? null,
    isFolder: item.folder !== null && item.folder !== undefined,
    parentPath: relativeParentPath(item.parentReference?.path),
  };
}

function searchPath(query: string): string {
  return `/drive/root/search(q='${encodeURIComponent(query.replace(/'/g, "''"))}')`;
}

export function findFiles(session: GraphSession): Operation {
  return defineGraphOperation<{ query: string; top: number }>(session, {
    name: "find_files",
    summary: "search OneDrive for files and folders",
    usage: "find_files --query TEXT [--top N]",
    input: "none",
    parse(args) {
      const { values } = parseOptions("find_files", () =>
        parseArgs({
          args: [...args],
          options: { query: { type: "string" }, top: { type: "string" } },
          strict: true,
          allowPositionals: false,
        })
      );
      return {
        query: requireOption(values.query, "query"),
        top: parsePositiveInt(values.top, "top", DEFAULT_TOP),
      };
    },
    async execute(client, params, _input, ctx) {
      const items = await client.listAll(
        searchPath(params.query),
        { $top: Math.min(params.top, PAGE_SIZE), $select: ITEM_FIELDS.join(",") },
        params.top
      );
      const files = items.map((item) => fileRecord(parseResource(DriveItemSchema, item, "drive item")));
      ctx.logger.info("Files found", { query: params.query, count: files.length });
      return createObjectList(files);
    },
  });
}

export function downloadFiles(session: GraphSession): Operation {
  return defineGraphOperation<{ ids: string[]; dst?: string }>(session, {
    name: "download_files",
    summary: "download OneDrive files by id (--ids or input records)",
    usage: "download_files [--ids ID[,ID]] [--dst DIR]",
    input: "optional",
    parse(args) {
      const { values } = parseOptions("download_files", () =>
        parseArgs({
          args: [...args],
          options: { ids: { type: "string" }, dst: { type: "string" } },
          strict: true,
          allowPositionals: false,
        })
      );
      const dst = values.dst !== undefined && values.dst.trim() !== "" ? values.dst : undefined;
      return { ids: splitList(values.ids), ...(dst !== undefined ? { dst } : {}) };
    },
    bind: (params, binding) => requireItemsOrInput(params.ids, binding, "download_files", "ids"),
    async execute(client, params, input, ctx) {
      const downloaded: DataRecord[] = [];
      for (const id of idsFrom(params.ids, input, "download_files")) {
        throwIfCancelled(ctx, "download_files", downloaded);
        const item = parseResource(
          DriveItemSchema,
          await client.get(driveItemById(id), { $select: ITEM_FIELDS.join(",") }),
          "drive item"
        );
        if (item.folder !== null && item.folder !== undefined) {
          throw new Error(`download_files: ${item.name} (${id}) is a folder`);
        }
        const file = await client.getBinary(`${driveItemById(id)}/content`);
        const content = await ctx.blobs.put(item.name, file.data, file.contentType, params.dst);
        downloaded.push({ id, name: item.name, path: content.$blob, content });
      }
      ctx.logger.info("Files downloaded", { count: downloaded.length, dst: params.dst ?? ctx.blobs.directory });
      return createObjectList(downloaded);
    },
  });
}

function uploadSources(src: readonly string[], input: ObjectList | undefined): string[] {
  if (src.length > 0) {
    return [...src];
  }
  return (input ?? []).map((record, index) => requireStringField(record, "path", index, "upload_files"));
}

export function uploadFiles(session: GraphSession): Operation {
  return defineGraphOperation<{ src: string[]; dst: string }>(session, {
    name: "upload_files",
    summary: "upload local files (--src or input records with a path) to a OneDrive folder",
    usage: "upload_files [--src FILE[,FILE]] [--dst FOLDER]",
    input: "optional",
    parse(args) {
      const { values } = parseOptions("upload_files", () =>
        parseArgs({
          args: [...args],
          options: { src: { type: "string" }, dst: { type: "string" } },
          strict: true,
          allowPositionals: false,
        })
      );
      return { src: splitList(values.src), dst: values.dst ?? "" };
    },
    bind: (params, binding) => requireItemsOrInput(params.src, binding, "upload_files", "src"),
    async execute(client, params, input, ctx) {
      const uploaded: DataRecord[] = [];
      for (const source of uploadSources(params.src, input)) {
        throwIfCancelled(ctx, "upload_files", uploaded);
        const name = basename(source);
        const data = await readFile(source);
        const target = driveItemByPath([...pathSegments(params.dst), name].join("/"));
        const item = parseResource(DriveItemSchema, await client.put(`${target}/content`, data), "drive item");
        uploaded.push({ id: item.id, name: item.name, size: item.size ?? data.byteLength, webUrl: item.webUrl ?? null });
      }
      ctx.logger.info("Files uploaded", { count: uploaded.length, dst: params.dst || "/" });
      return createObjectList(uploaded);
    },
  });
}

export function createFolder(session: GraphSession): Operation {
  return defineGraphOperation<{ parent: string; name: string }>(session, {
    name: "create_folder",
    summary: "create a OneDrive folder",
    usage: "create_folder --name NAME [--folder PARENT]",
    input: "none",
    parse(args) {
      const { values } = parseOptions("create_folder", () =>
        parseArgs({
          args: [...args],
          options: { folder: { type: "string" }, name: { type: "string" } },
          strict: true,
          allowPositionals: false,
        })
      );
      const name = requireOption(values.name, "name");
      if (name.includes("/")) {
        throw new OperationArgumentError(`--name must be a single folder name, got: ${name}`);
      }
      return { parent: values.folder ?? "", name };
    },
    async execute(client, params, _input, ctx) {
      const item = parseResource(
        DriveItemSchema,
        await client.post(`${driveItemByPath(params.parent)}/children`, {
          name: params.name,
          folder: {},
          "@microsoft.graph.conflictBehavior": "fail",
        }),
        "drive item"
      );
      const path = `/${[...pathSegments(params.parent), item.name].join("/")}`;
      ctx.logger.info("Folder created", { id: item.id, path });
      return createObjectList([{ id: item.id, name: item.name, webUrl: item.webUrl ?? null, path }]);
    },
  });
}

export function deleteFiles(session: GraphSession): Operation {
  return defineGraphOperation<{ ids: string[] }>(session, {
    name: "delete_files",
    summary: "delete OneDrive items by id (--ids or input records)",
    usage: "delete_files [--ids ID[,ID]]",
    input: "optional",
    parse(args) {
      const { values } = parseOptions("delete_files", () =>
        parseArgs({ args: [...args], options: { ids: { type: "string" } }, strict: true, allowPositionals: false })
      );
      return { ids: splitList(values.ids) };
    },
    bind: (params, binding) => requireItemsOrInput(params.ids, binding, "delete_files", "ids"),
    async execute(client, params, input, ctx) {
      const deleted: DataRecord[] = [];
      for (const id of idsFrom(params.ids, input, "delete_files")) {
        throwIfCancelled(ctx, "delete_files", deleted);
        await client.delete(driveItemById(id));
        deleted.push({ id, deleted: true });
      }
      ctx.logger.info("Items deleted", { count: deleted.length });
      return createObjectList(deleted);
    },
  });
}

export function onedriveOperations(session: GraphSession): Operation[] {
  return [findFiles(session), downloadFiles(session), uploadFiles(session), createFolder(session), deleteFiles(session)];
}
