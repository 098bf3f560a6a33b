import path from "path";
import {
  CHECKSUM_MANIFEST_NAMES,
  checksumManifestBaseUrl,
  digestsMatch,
  parseChecksumManifest,
  sha256Hex
} from "../../../core/src/checksum";
import type { ChecksumStatus } from "../../../shared/src/contracts";
import { ChecksumMismatchError, DownloadError } from "../errors";
import type { Logger } from "../logger";

export interface ChecksumVerification {
  digest: string;
  status: ChecksumStatus;
  /** Checksum manifest the digest was compared against. */
  manifestUrl?: string;
}

export interface UpstreamChecksums {
  url: string;
  checksums: Map<string, string>;
}

export class ChecksumService {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  /** Fetches the whole body into memory. */
  async download(url: string): Promise<Buffer> {
    let response: Response;
    try {
      response = await fetch(url, { redirect: "follow" });
    } catch (error) {
      throw new DownloadError(url, error instanceof Error ? error.message : "request failed");
    }
    if (!response.ok) {
      await response.text();
      throw new DownloadError(url, `HTTP ${response.status}`, response.status);
    }
    return Buffer.from(await response.arrayBuffer());
  }

  /**
   * Probes the conventional manifest names beside the asset. The first
   * manifest with at least one parseable line wins.
   */
  async findUpstreamChecksums(assetUrl: string): Promise<UpstreamChecksums | undefined> {
    const baseUrl = checksumManifestBaseUrl(assetUrl);
    for (const name of CHECKSUM_MANIFEST_NAMES) {
      const url = `${baseUrl}${name}`;
      let content: string;
      try {
        content = (await this.download(url)).toString("utf8");
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        this.logger.info("Checksum manifest probe missed", { url, reason });
        continue;
      }
      const checksums = parseChecksumManifest(content);
      if (checksums.size > 0) {
        return { url, checksums };
      }
    }
    return undefined;
  }

  /** Throws ChecksumMismatchError when an upstream digest disagrees. */
  async verify(bytes: Uint8Array, assetName: string, assetUrl: string): Promise<ChecksumVerification> {
    const digest = sha256Hex(bytes);
    const upstream = await this.findUpstreamChecksums(assetUrl);
    if (!upstream) {
      this.logger.info("No upstream checksum manifest found", { asset: assetName });
      return { digest, status: "no-upstream-manifest" };
    }
    const expected = lookupDigest(upstream.checksums, assetName);
    if (!expected) {
      this.logger.info("Asset not listed in upstream checksum manifest", {
        asset: assetName,
        manifest: upstream.url
      });
      return { digest, status: "not-listed", manifestUrl: upstream.url };
    }
    if (!digestsMatch(expected, digest)) {
      throw new ChecksumMismatchError(assetName, expected, digest);
    }
    this.logger.info("Checksum verified against upstream manifest", {
      asset: assetName,
      manifest: upstream.url
    });
    return { digest, status: "verified", manifestUrl: upstream.url };
  }
}

/** Exact name first, then entries listed with a directory prefix such as `./dist/`. */
function lookupDigest(checksums: Map<string, string>, assetName: string): string | undefined {
  const exact = checksums.get(assetName);
  if (exact) {
    return exact;
  }
  for (const [name, digest] of checksums) {
    if (path.posix.basename(name) === assetName) {
      return digest;
    }
  }
  return undefined;
}
