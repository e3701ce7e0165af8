import { fileURLToPath } from 'node:url';
import { loadSync, type MethodDefinition, type PackageDefinition } from '@grpc/proto-loader';

export const PROTO_DIRECTORY = fileURLToPath(new URL('../proto/', import.meta.url));
export const PROTO_PACKAGE = 'sendlix.api.v1';

const PROTO_FILES = ['auth.proto', 'group.proto', 'email.proto'];

export type UnaryMethod = MethodDefinition<object, object>;

export interface GroupApiMethods {
  getJwtToken: UnaryMethod;
  insertEmailToGroup: UnaryMethod;
  sendEmail: UnaryMethod;
}

/**
 * Load the remote service definitions from the bundled .proto files.
 * int64 fields come back as strings.
 */
export function loadGroupApiMethods(directory: string = PROTO_DIRECTORY): GroupApiMethods {
  const definition = loadSync(PROTO_FILES, {
    includeDirs: [directory],
    keepCase: true,
    longs: String,
    enums: String,
    defaults: true,
    oneofs: true,
  });

  return {
    getJwtToken: findMethod(definition, 'Auth', 'GetJwtToken'),
    insertEmailToGroup: findMethod(definition, 'Group', 'InsertEmailToGroup'),
    sendEmail: findMethod(definition, 'Email', 'SendEmail'),
  };
}

function findMethod(definition: PackageDefinition, service: string, method: string): UnaryMethod {
  const serviceDefinition = definition[`${PROTO_PACKAGE}.${service}`];
  if (!serviceDefinition || 'format' in serviceDefinition) {
    throw new Error(`Service ${PROTO_PACKAGE}.${service} not found`);
  }

  const methodDefinition = serviceDefinition[method];
  if (!methodDefinition) {
    throw new Error(`Method ${service}.${method} not found`);
  }
  return methodDefinition;
}
