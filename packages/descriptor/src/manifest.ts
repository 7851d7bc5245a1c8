import { X509Certificate, verify } from 'node:crypto';
import { readFile } from 'node:fs/promises';
import { z } from 'zod';

import type { Dapp } from './dapp';
import { PAYLOAD_RUNTIME_VM_MANIFEST } from './dapp.schema';
import { ManifestError } from './errors';
import { formatPath } from './validation';
import { descriptorMapSchema, descriptorValueSchema, isPlainObject, type DescriptorMap } from './values';

const manifestSchema = z
  .object({
    version: z.string().optional(),
    createdAt: z.coerce.date(),
    expiresAt: z.coerce.date(),
    payload: z.array(descriptorValueSchema).optional(),
    compManifest: descriptorMapSchema.optional(),
  })
  .passthrough();

export type PayloadManifest = z.infer<typeof manifestSchema>;

export type ManifestCheck = {
  payload: string;
  /** Non-fatal findings, e.g. a certificate without a signature. */
  warnings: string[];
};

export type VerifyManifestsOptions = {
  now?: Date;
};

const DEFAULT_SIG_ALGORITHM = 'sha256';
const PEM_CERT_RE = /-----BEGIN CERTIFICATE-----[\s\S]*?-----END CERTIFICATE-----/g;

function stringParam(name: string, params: DescriptorMap, key: string): string | undefined {
  const value = params[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') throw new ManifestError(name, `\`${key}\` must be a string`);
  return value;
}

type JsonResult = { ok: true; value: unknown } | { ok: false; error: unknown };

function tryParseJson(text: string): JsonResult {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch (error) {
    return { ok: false, error };
  }
}

function parseJson(name: string, text: string, what: string): unknown {
  const result = tryParseJson(text);
  if (!result.ok) throw new ManifestError(name, `${what} is not valid JSON`, result.error);
  return result.value;
}

async function readJsonFile(name: string, path: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    throw new ManifestError(name, `Cannot read \`${path}\``, err);
  }
  return parseJson(name, text, `\`${path}\``);
}

function decodeManifestString(name: string, raw: string): unknown {
  const decoded = tryParseJson(Buffer.from(raw, 'base64').toString('utf8'));
  if (decoded.ok) return decoded.value;
  const plain = tryParseJson(raw);
  if (!plain.ok) throw new ManifestError(name, 'Manifest content is neither valid base64 nor valid JSON', plain.error);
  return plain.value;
}

async function readManifest(name: string, params: DescriptorMap): Promise<PayloadManifest | undefined> {
  let content: unknown;
  const inline = params.manifest;
  if (inline !== undefined && inline !== null) {
    content = typeof inline === 'string' ? decodeManifestString(name, inline) : inline;
  } else {
    const path = stringParam(name, params, 'manifest_path');
    if (path === undefined) return undefined;
    content = await readJsonFile(name, path);
  }

  const parsed = manifestSchema.safeParse(content);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${formatPath(issue.path) || '(root)'}: ${issue.message}`);
    throw new ManifestError(name, `Invalid manifest: ${issues.join('; ')}`);
  }
  return parsed.data;
}

async function readCertificate(name: string, params: DescriptorMap): Promise<X509Certificate | undefined> {
  let encoded = stringParam(name, params, 'manifest_cert');
  if (encoded === undefined) {
    const path = stringParam(name, params, 'manifest_cert_path');
    if (path === undefined) return undefined;
    try {
      encoded = await readFile(path, 'utf8');
    } catch (err) {
      throw new ManifestError(name, `Cannot read \`${path}\``, err);
    }
  }

  // A chain may be given; the signing certificate comes last.
  const pem = Buffer.from(encoded.trim(), 'base64').toString('utf8');
  const blocks = pem.match(PEM_CERT_RE);
  const last = blocks?.at(-1);
  if (!last) throw new ManifestError(name, 'Manifest certificate is not a PEM certificate');
  try {
    return new X509Certificate(last);
  } catch (err) {
    throw new ManifestError(name, 'Manifest certificate cannot be parsed', err);
  }
}

function checkSignature(name: string, params: DescriptorMap, cert: X509Certificate, signature: string): void {
  const algorithm = stringParam(name, params, 'manifest_sig_algorithm') || DEFAULT_SIG_ALGORITHM;
  const inline = params.manifest;
  const signed = typeof inline === 'string' ? inline : JSON.stringify(inline ?? null);

  let valid: boolean;
  try {
    valid = verify(algorithm, Buffer.from(signed), cert.publicKey, Buffer.from(signature, 'base64'));
  } catch (err) {
    throw new ManifestError(name, 'Manifest signature verification failed.', err);
  }
  if (!valid) throw new ManifestError(name, 'Manifest signature verification failed.');
}

export async function verifyManifest(
  name: string,
  params: DescriptorMap,
  now: Date = new Date(),
): Promise<ManifestCheck> {
  const warnings: string[] = [];
  const manifest = await readManifest(name, params);

  const descriptorPath = stringParam(name, params, 'node_descriptor_path');
  if (descriptorPath !== undefined) {
    const nodeDescriptor = await readJsonFile(name, descriptorPath);
    if (!isPlainObject(nodeDescriptor)) throw new ManifestError(name, 'Node descriptor must be a JSON object');
    if (!manifest) throw new ManifestError(name, 'node_descriptor requires a manifest to be present');
    return { payload: name, warnings };
  }
  if (!manifest) return { payload: name, warnings };

  if (manifest.createdAt > now) throw new ManifestError(name, 'Manifest creation date is set to future.');
  if (manifest.expiresAt < now) throw new ManifestError(name, 'Manifest already expired.');

  const cert = await readCertificate(name, params);
  const signature = stringParam(name, params, 'manifest_sig');

  if (cert) {
    const notBefore = new Date(cert.validFrom);
    const notAfter = new Date(cert.validTo);
    if (now < notBefore) {
      throw new ManifestError(
        name,
        `Manifest certificate is not yet valid (not valid before: ${notBefore.toISOString()}).`,
      );
    }
    if (now > notAfter) {
      throw new ManifestError(
        name,
        `Manifest certificate is no longer valid (not valid after: ${notAfter.toISOString()}).`,
      );
    }
    if (!signature) warnings.push('Manifest certificate provided but no signature present.');
  }

  if (signature) {
    if (!cert) throw new ManifestError(name, 'Manifest signature present but no certificate given.');
    checkSignature(name, params, cert, signature);
  }
  return { payload: name, warnings };
}

/** Verify the manifest of every `vm/manifest` payload of the dapp. */
export async function verifyManifests(dapp: Dapp, options: VerifyManifestsOptions = {}): Promise<ManifestCheck[]> {
  const now = options.now ?? new Date();
  const checks: ManifestCheck[] = [];
  for (const [name, payload] of Object.entries(dapp.payloads)) {
    if (payload.runtime !== PAYLOAD_RUNTIME_VM_MANIFEST) continue;
    checks.push(await verifyManifest(name, payload.params, now));
  }
  return checks;
}
