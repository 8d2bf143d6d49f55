// src/resources.ts
// Every record resource the service exposes under /v1/<name>.

import type { ResourceDefinition } from "@/modules/records/record.definition";
import { exampleResource } from "@/modules/example/example.resource";

export const RESOURCES: readonly ResourceDefinition[] = [exampleResource];
