// packages/memory/src/drizzle/index.ts
import { getDb, type Db } from "@orcha/sources/client";
import type { Repositories } from "../repositories";
import {
  DrizzleConversationRepository,
  DrizzleFolderRepository,
  DrizzleMessageRepository,
} from "./conversations";
import { DrizzleUserMemoryRepository } from "./memories";
import { DrizzleTokenUsageRepository } from "./tokenUsage";
import { DrizzlePulseRepository, DrizzleUserRepository } from "./pulses";

export function createDrizzleRepositories(db: Db = getDb()): Repositories {
  return {
    conversations: new DrizzleConversationRepository(db),
    messages: new DrizzleMessageRepository(db),
    folders: new DrizzleFolderRepository(db),
    memories: new DrizzleUserMemoryRepository(db),
    tokenUsage: new DrizzleTokenUsageRepository(db),
    pulses: new DrizzlePulseRepository(db),
    users: new DrizzleUserRepository(db),
  };
}

export {
  DrizzleConversationRepository,
  DrizzleFolderRepository,
  DrizzleMessageRepository,
  DrizzleUserMemoryRepository,
  DrizzleTokenUsageRepository,
  DrizzlePulseRepository,
  DrizzleUserRepository,
};
