import type { EngineContext } from "#/core";
import { CredentialProvider } from "#/auth";
import { FabricClient } from "#/fabric";
import { WorkspaceReconciler } from "#/workspace";
import { AccessReconciler } from "#/access";
import { ArtifactMaterializer, discoverArtifacts, partitionArtifacts } from "#/artifact";
import { checkoutSource, describeCheckout } from "#/source";
import type { DeployConfig, SourceConfig } from "#/schemas";
import type { ItemType } from "#/item-types";
import { componentLogger } from "#/logging";
import { DeploymentOrchestrator } from "./orchestrator";
import type { DiscoveryPreview } from "./deploy.types";

/**
 * Wire the production components for one run. One credential provider is
 * shared by every API call of the run.
 */
export function createDeployment(ctx: EngineContext, config: DeployConfig): DeploymentOrchestrator {
  const { logger } = ctx;

  const tokens = new CredentialProvider(
    { tenantId: config.tenantId, clientId: config.clientId, clientSecret: config.clientSecret },
    ctx.http,
    ctx.clock,
    componentLogger(logger, "auth")
  );
  const fabric = new FabricClient(tokens, ctx.http, componentLogger(logger, "fabric"));

  return new DeploymentOrchestrator(ctx, config, {
    tokens,
    workspaces: new WorkspaceReconciler(fabric, ctx.clock, componentLogger(logger, "workspace")),
    access: new AccessReconciler(fabric, componentLogger(logger, "access")),
    materializer: new ArtifactMaterializer(fabric, ctx.fs, componentLogger(logger, "materializer")),
  });
}

/**
 * Fetch and classify the source tree without contacting the platform
 */
export async function previewDiscovery(
  ctx: EngineContext,
  source: SourceConfig,
  itemTypes?: readonly ItemType[]
): Promise<DiscoveryPreview> {
  const checkout = await checkoutSource(
    { fs: ctx.fs, fetcher: ctx.fetcher, paths: ctx.paths, logger: componentLogger(ctx.logger, "source") },
    source
  );

  try {
    const artifacts = discoverArtifacts(ctx.fs, checkout.root, source.folder, componentLogger(ctx.logger, "discovery"));
    const { eligible, excluded } = partitionArtifacts(artifacts, itemTypes);
    return {
      source: describeCheckout(checkout),
      branch: checkout.branch,
      artifacts,
      eligible,
      excluded,
    };
  } finally {
    checkout.release();
  }
}
