/**
 * RuleTypeService methods.
 */

import { z } from 'zod';
import { RuleType, Severity } from '../domain/rule-type';
import { Method, defineMethod } from '../rpc/policy';
import { EMPTY, Services, contextsOf, methodName, projectScoped, providerFor } from './common';

const SERVICE = 'RuleTypeService';

const StageSchema = z.object({ type: z.string() }).passthrough();

const DefinitionSchema = z.object({
  inEntity: z.string(),
  ruleSchema: z.record(z.unknown()),
  paramSchema: z.record(z.unknown()).optional(),
  ingest: StageSchema,
  eval: StageSchema,
  remediate: StageSchema.optional(),
  alert: StageSchema.optional(),
});

const RuleTypeInputSchema = z.object({
  name: z.string(),
  displayName: z.string().optional(),
  description: z.string().optional(),
  guidance: z.string().optional(),
  severity: z.nativeEnum(Severity).optional(),
  def: DefinitionSchema,
});

const WriteRuleTypeRequest = z.object({
  ...projectScoped,
  ruleType: RuleTypeInputSchema,
});

/** Wire form of a rule type. */
function toWire(ruleType: RuleType) {
  return {
    id: ruleType.id,
    name: ruleType.name,
    displayName: ruleType.displayName,
    description: ruleType.description,
    guidance: ruleType.guidance,
    severity: ruleType.severity,
    context: { project: ruleType.projectId, provider: ruleType.providerName },
    def: ruleType.definition,
  };
}

export function ruleTypeMethods(services: Services): Method[] {
  return [
    defineMethod({
      fullName: methodName(SERVICE, 'CreateRuleType'),
      options: { targetResource: 'project' },
      request: WriteRuleTypeRequest,
      contextOf: contextsOf,
      handler: async (ctx, req) => {
        const provider = await providerFor(services, ctx);
        const ruleType = await services.ruleTypes.createRuleType(
          ctx.signal,
          ctx.requireEntity().project.id,
          provider,
          req.ruleType,
        );
        return { ruleType: toWire(ruleType) };
      },
    }),

    defineMethod({
      fullName: methodName(SERVICE, 'UpdateRuleType'),
      options: { targetResource: 'project' },
      request: WriteRuleTypeRequest,
      contextOf: contextsOf,
      handler: async (ctx, req) => {
        const provider = await providerFor(services, ctx);
        const ruleType = await services.ruleTypes.updateRuleType(
          ctx.signal,
          ctx.requireEntity().project.id,
          provider,
          req.ruleType,
        );
        return { ruleType: toWire(ruleType) };
      },
    }),

    defineMethod({
      fullName: methodName(SERVICE, 'DeleteRuleType'),
      options: { targetResource: 'project' },
      request: z.object({ ...projectScoped, id: z.string().uuid() }),
      contextOf: contextsOf,
      handler: async (ctx, req) => {
        await services.ruleTypes.deleteRuleType(ctx.signal, ctx.requireEntity().project.id, req.id);
        return EMPTY;
      },
    }),

    defineMethod({
      fullName: methodName(SERVICE, 'GetRuleTypeByName'),
      options: { targetResource: 'project' },
      request: z.object({ ...projectScoped, name: z.string().min(1) }),
      contextOf: contextsOf,
      handler: async (ctx, req) => {
        const provider = await providerFor(services, ctx);
        const ruleType = await services.ruleTypes.getRuleTypeByName(
          ctx.requireEntity().project.id,
          provider.name,
          req.name,
        );
        return { ruleType: toWire(ruleType) };
      },
    }),

    defineMethod({
      fullName: methodName(SERVICE, 'GetRuleTypeById'),
      options: { targetResource: 'project' },
      request: z.object({ ...projectScoped, id: z.string().uuid() }),
      contextOf: contextsOf,
      handler: async (ctx, req) => {
        const ruleType = await services.ruleTypes.getRuleTypeById(ctx.requireEntity().project.id, req.id);
        return { ruleType: toWire(ruleType) };
      },
    }),

    defineMethod({
      fullName: methodName(SERVICE, 'ListRuleTypes'),
      options: { targetResource: 'project' },
      request: z.object({ ...projectScoped }),
      contextOf: contextsOf,
      handler: async (ctx) => {
        const provider = await providerFor(services, ctx);
        const ruleTypes = await services.ruleTypes.listRuleTypes(ctx.requireEntity().project.id, provider.name);
        return { ruleTypes: ruleTypes.map(toWire) };
      },
    }),
  ];
}
