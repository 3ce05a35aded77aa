/**
 * src/modules/references/reference.module.ts
 *
 * WHY:
 * - Wires the four reference kinds: one service + one controller each.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { FastifyInstance } from 'fastify';

import { parseRequest } from '../../shared/http/parse-request';
import { ReferenceController } from './reference.controller';
import { registerReferenceRoutes } from './reference.routes';
import {
  createCertificateDefinitionSchema,
  createCertificationSchema,
  createMaterialDefinitionSchema,
  createMaterialSchema,
  updateCertificateDefinitionSchema,
  updateCertificationSchema,
  updateMaterialDefinitionSchema,
  updateMaterialSchema,
} from './reference.schemas';
import {
  CertificateDefinitionService,
  CertificationService,
  MaterialDefinitionService,
  MaterialService,
  type ReferenceServiceDeps,
} from './reference.service';

export type ReferenceModule = ReturnType<typeof createReferenceModule>;

export function createReferenceModule(deps: ReferenceServiceDeps) {
  const materialService = new MaterialService(deps);
  const certificationService = new CertificationService(deps);
  const certificateDefinitionService = new CertificateDefinitionService(deps);
  const materialDefinitionService = new MaterialDefinitionService(deps);

  const controllers = {
    materials: new ReferenceController(materialService, {
      create: (body) => parseRequest(createMaterialSchema, body),
      update: (body) => parseRequest(updateMaterialSchema, body),
    }),
    certifications: new ReferenceController(certificationService, {
      create: (body) => parseRequest(createCertificationSchema, body),
      update: (body) => parseRequest(updateCertificationSchema, body),
    }),
    'certificate-definitions': new ReferenceController(certificateDefinitionService, {
      create: (body) => parseRequest(createCertificateDefinitionSchema, body),
      update: (body) => parseRequest(updateCertificateDefinitionSchema, body),
    }),
    'material-definitions': new ReferenceController(materialDefinitionService, {
      create: (body) => parseRequest(createMaterialDefinitionSchema, body),
      update: (body) => parseRequest(updateMaterialDefinitionSchema, body),
    }),
  };

  return {
    materialService,
    certificationService,
    certificateDefinitionService,
    materialDefinitionService,
    registerRoutes(app: FastifyInstance) {
      for (const [segment, controller] of Object.entries(controllers)) {
        registerReferenceRoutes(app, segment, controller);
      }
    },
  };
}
