// apps/api/src/routes/conversations.ts
import { Router } from "express";
import { z } from "zod";
import type { Log } from "@orcha/utils";
import type { ConversationStore } from "@orcha/memory";
import { Id, Page, requestContext, sendError } from "../http";

const TitleBody = z.object({ title: z.string() });
const FolderBody = z.object({ name: z.string() });

export function conversationsRouter(deps: { conversations: ConversationStore; log: Log }): Router {
  const router = Router();
  const { conversations } = deps;

  router.get("/conversations/:userId", async (req, res) => {
    const { log } = requestContext(res, deps.log);
    try {
      const userId = Id.parse(req.params.userId);
      res.json(await conversations.listConversations(userId, Page.parse(req.query)));
    } catch (e) {
      sendError(res, e, log, "GET /conversations");
    }
  });

  router.get("/conversations/:userId/:conversationId", async (req, res) => {
    const { log } = requestContext(res, deps.log);
    try {
      const found = await conversations.getConversation(Id.parse(req.params.userId), Id.parse(req.params.conversationId));
      if (!found) {
        res.status(404).json({ error: "conversation not found" });
        return;
      }
      res.json({ ...found.conversation, messages: found.messages });
    } catch (e) {
      sendError(res, e, log, "GET /conversations/:id");
    }
  });

  router.put("/conversations/:userId/:conversationId", async (req, res) => {
    const { log } = requestContext(res, deps.log);
    try {
      const { title } = TitleBody.parse(req.body ?? {});
      const ok = await conversations.rename(Id.parse(req.params.userId), Id.parse(req.params.conversationId), title);
      res.status(ok ? 200 : 404).json(ok ? { updated: true } : { error: "conversation not found" });
    } catch (e) {
      sendError(res, e, log, "PUT /conversations/:id");
    }
  });

  router.delete("/conversations/:userId/:conversationId", async (req, res) => {
    const { log } = requestContext(res, deps.log);
    try {
      const ok = await conversations.softDelete(Id.parse(req.params.userId), Id.parse(req.params.conversationId));
      res.status(ok ? 200 : 404).json(ok ? { deleted: true } : { error: "conversation not found" });
    } catch (e) {
      sendError(res, e, log, "DELETE /conversations/:id");
    }
  });

  router.post("/folders/:userId", async (req, res) => {
    const { log } = requestContext(res, deps.log);
    try {
      const { name } = FolderBody.parse(req.body ?? {});
      res.status(201).json(await conversations.createFolder(Id.parse(req.params.userId), name));
    } catch (e) {
      sendError(res, e, log, "POST /folders");
    }
  });

  router.put("/folders/:userId/:folderId", async (req, res) => {
    const { log } = requestContext(res, deps.log);
    try {
      const { name } = FolderBody.parse(req.body ?? {});
      const ok = await conversations.renameFolder(Id.parse(req.params.userId), Id.parse(req.params.folderId), name);
      res.status(ok ? 200 : 404).json(ok ? { updated: true } : { error: "folder not found" });
    } catch (e) {
      sendError(res, e, log, "PUT /folders/:id");
    }
  });

  // member conversations are kept and moved out of the folder
  router.delete("/folders/:userId/:folderId", async (req, res) => {
    const { log } = requestContext(res, deps.log);
    try {
      const ok = await conversations.softDeleteFolderCascade(Id.parse(req.params.userId), Id.parse(req.params.folderId));
      res.status(ok ? 200 : 404).json(ok ? { deleted: true } : { error: "folder not found" });
    } catch (e) {
      sendError(res, e, log, "DELETE /folders/:id");
    }
  });

  return router;
}
