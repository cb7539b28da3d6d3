import type { FastifyInstance } from "fastify";
import { registerAdminRoutes, type AdminRoutesDependencies } from "./admin.js";
import { registerConversationRoutes, type ConversationRoutesDependencies } from "./conversations.js";
import { registerDocumentRoutes, type DocumentRoutesDependencies } from "./documents.js";
import { registerSearchRoutes, type SearchRoutesDependencies } from "./search.js";

export interface ApiRoutesDependencies {
  admin?: AdminRoutesDependencies;
  conversations?: ConversationRoutesDependencies;
  documents?: DocumentRoutesDependencies;
  search?: SearchRoutesDependencies;
}

export async function registerApiRoutes(app: FastifyInstance, dependencies?: ApiRoutesDependencies): Promise<void> {
  await registerDocumentRoutes(app, dependencies?.documents);
  await registerSearchRoutes(app, dependencies?.search);
  await registerConversationRoutes(app, dependencies?.conversations);
  await registerAdminRoutes(app, dependencies?.admin);
}
