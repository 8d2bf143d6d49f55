// src/modules/example/example.resource.ts
// Purpose: Reference resource. Copy this file to add a new record type.

import { z } from "zod";
import { defineResource } from "@/modules/records/record.definition";

export const exampleResource = defineResource({
  name: "example",
  table: "example",
  label: "Example",

  fields: {
    name: { label: "Name", schema: z.string().trim().max(255) },
  },

  scenarios: {
    create: {
      permitted: ["name", "status", "detail"],
      required: ["name"],
    },
    update: {
      permitted: ["id", "lockVersion", "name", "status", "detail"],
      required: ["id", "lockVersion"],
    },
    delete: {
      permitted: ["id", "lockVersion"],
      required: ["id", "lockVersion"],
    },
  },

  detailFields: ["description", "notes"],

  search: {
    id: "equals",
    name: "like",
    status: "status",
  },
  sortable: ["id", "name", "status"],

  guardedFields: ["name", "status"],
  dependencies: [{ table: "example_item", columns: ["example_id"] }],

  mirror: { collection: "example", uniqueKeys: ["id"] },
});
