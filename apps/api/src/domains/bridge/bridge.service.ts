// ============================================================================
// Bridge Registry Service
// Registration, callback URL updates, resolution and soft suspension of
// HIP/HIU bridges. No side effects beyond the registry itself.
// ============================================================================

import {
  BridgeStatus,
  type BridgeRole,
  type BridgeService,
} from '@consent-gateway/shared/constants/bridge.constants.js';
import { GatewayErrorCode } from '@consent-gateway/shared/constants/gateway.constants.js';
import type { SelectBridge } from '@consent-gateway/shared/schemas/db/gateway.schema.js';
import {
  ConflictError,
  ForbiddenError,
  NotFoundError,
  ValidationError,
} from '../../lib/errors.js';
import type { Clock } from '../../lib/clock.js';
import type { Logger } from '../../lib/logger.js';
import type { BridgeRepository } from './bridge.repository.js';

// ---------------------------------------------------------------------------
// Dependencies
// ---------------------------------------------------------------------------

export interface BridgeRegistryDeps {
  bridgeRepo: BridgeRepository;
  clock: Clock;
  logger: Logger;
}

function unknownBridge(bridgeId: string): NotFoundError {
  return new NotFoundError(`Bridge ${bridgeId}`, GatewayErrorCode.UNKNOWN_BRIDGE);
}

// ---------------------------------------------------------------------------
// Service Factory
// ---------------------------------------------------------------------------

export function createBridgeRegistry(deps: BridgeRegistryDeps) {
  const { bridgeRepo, clock, logger } = deps;

  async function resolve(bridgeId: string): Promise<SelectBridge> {
    const bridge = await bridgeRepo.findById(bridgeId);
    if (!bridge) throw unknownBridge(bridgeId);
    return bridge;
  }

  async function setStatus(bridgeId: string, status: BridgeStatus): Promise<SelectBridge> {
    const updated = await bridgeRepo.update(bridgeId, { status, updatedAt: clock.now() });
    if (!updated) throw unknownBridge(bridgeId);
    logger.info({ bridgeId, status }, 'bridge status changed');
    return updated;
  }

  return {
    /**
     * Register a new bridge as ACTIVE.
     * Fails with DUPLICATE_BRIDGE if the id is taken, whatever its status.
     */
    async register(
      bridgeId: string,
      role: BridgeRole,
      callbackUrl: string,
      services: readonly BridgeService[],
    ): Promise<SelectBridge> {
      const now = clock.now();
      const created = await bridgeRepo.insert({
        bridgeId,
        role,
        callbackUrl,
        registeredServices: [...new Set(services)],
        status: BridgeStatus.ACTIVE,
        createdAt: now,
        updatedAt: now,
      });

      if (!created) {
        throw new ConflictError(
          `Bridge ${bridgeId} is already registered`,
          GatewayErrorCode.DUPLICATE_BRIDGE,
        );
      }

      logger.info({ bridgeId, role }, 'bridge registered');
      return created;
    },

    /** Replace a bridge's webhook URL. */
    async updateCallback(bridgeId: string, newUrl: string): Promise<SelectBridge> {
      const updated = await bridgeRepo.update(bridgeId, {
        callbackUrl: newUrl,
        updatedAt: clock.now(),
      });
      if (!updated) throw unknownBridge(bridgeId);
      return updated;
    },

    resolve,

    /**
     * Resolve a bridge that a flow is about to address: it must exist, play
     * the expected role and not be suspended.
     */
    async resolveActive(bridgeId: string, role: BridgeRole): Promise<SelectBridge> {
      const bridge = await resolve(bridgeId);
      if (bridge.role !== role) {
        throw new ValidationError(
          `Bridge ${bridgeId} is registered as ${bridge.role}, not ${role}`,
          undefined,
          GatewayErrorCode.BRIDGE_ROLE_MISMATCH,
        );
      }
      if (bridge.status !== BridgeStatus.ACTIVE) {
        throw new ForbiddenError(
          `Bridge ${bridgeId} is suspended`,
          GatewayErrorCode.BRIDGE_SUSPENDED,
        );
      }
      return bridge;
    },

    suspend(bridgeId: string): Promise<SelectBridge> {
      return setStatus(bridgeId, BridgeStatus.SUSPENDED);
    },

    activate(bridgeId: string): Promise<SelectBridge> {
      return setStatus(bridgeId, BridgeStatus.ACTIVE);
    },
  };
}

export type BridgeRegistry = ReturnType<typeof createBridgeRegistry>;
