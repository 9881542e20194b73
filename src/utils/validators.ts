/**
 * Pure validation utility functions
 */

import type { ArgoApplication } from "../types/argo.js";
import type { ServiceType } from "../types/domain.js";

export const SERVICE_TYPES: readonly ServiceType[] = [
  "ClusterIP",
  "NodePort",
  "LoadBalancer",
];

/**
 * Validate if string is a valid Kubernetes resource name
 */
export function isValidK8sName(name: string): boolean {
  // K8s names must be lowercase, alphanumeric, with dashes and dots
  const k8sNameRegex = /^[a-z0-9][a-z0-9\-.]*[a-z0-9]$|^[a-z0-9]$/;
  return k8sNameRegex.test(name) && name.length <= 253;
}

/**
 * Validate if string is a valid namespace name
 */
export function isValidNamespace(namespace: string): boolean {
  // Namespace names have stricter rules than general K8s names
  const namespaceRegex = /^[a-z0-9][a-z0-9-]*[a-z0-9]$|^[a-z0-9]$/;
  return namespaceRegex.test(namespace) && namespace.length <= 63;
}

/**
 * Environment names end up in directory, application and namespace names
 */
export function isValidEnvironmentName(name: string): boolean {
  return /^[a-z0-9-]+$/.test(name) && name.length <= 20;
}

/**
 * Validate if value is a positive integer
 */
export function isPositiveInteger(value: unknown): boolean {
  const num = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
  return typeof num === "number" && Number.isInteger(num) && num > 0;
}

export function isServiceType(value: string): value is ServiceType {
  return SERVICE_TYPES.some((t) => t === value);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isArgoApplication(value: unknown): value is ArgoApplication {
  return isRecord(value) && value.kind === "Application";
}
