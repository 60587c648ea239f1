// shared/cloud-init.ts — User-data payload: templates embedded into a cloud-init document

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

export const TEMPLATES_DIR = fileURLToPath(new URL("../../templates/", import.meta.url));

export const PLACEHOLDERS = {
  label: "INSTANCE_LABEL_PLACEHOLDER",
  compose: "DOCKER_COMPOSE_BASE64_CONTENT_PLACEHOLDER",
  install: "INSTALL_SH_BASE64_CONTENT_PLACEHOLDER",
  model: "MODEL_ID_PLACEHOLDER",
} as const;

export interface PayloadTemplates {
  cloudInit: string;
  installScript: string;
  compose: string;
}

export function loadTemplates(dir = TEMPLATES_DIR): PayloadTemplates {
  const read = (name: string) => readFileSync(`${dir}/${name}`, "utf-8");
  return {
    cloudInit: read("cloud-init.yaml"),
    installScript: read("install.sh"),
    compose: read("docker-compose.yml"),
  };
}

function toBase64(text: string): string {
  return Buffer.from(text, "utf-8").toString("base64");
}

export function renderCompose(template: string, model: string): string {
  return template.replaceAll(PLACEHOLDERS.model, model);
}

/** The cloud-init document with both artifacts inlined, so the instance fetches nothing of ours at boot. */
export function renderCloudInit(templates: PayloadTemplates, label: string, model: string): string {
  return templates.cloudInit
    .replaceAll(PLACEHOLDERS.label, label)
    .replaceAll(PLACEHOLDERS.compose, toBase64(renderCompose(templates.compose, model)))
    .replaceAll(PLACEHOLDERS.install, toBase64(templates.installScript));
}

/** Base64 user data for the create request's `metadata.user_data`. */
export function buildUserData(templates: PayloadTemplates, label: string, model: string): string {
  return toBase64(renderCloudInit(templates, label, model));
}
