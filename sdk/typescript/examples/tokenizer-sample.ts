/**
 * Tokenizer sample: policy templates, access policies, transformers and tokens
 */

import {
    AccessPolicyOpen,
    DataType,
    matchesResource,
    newAccessPolicy,
    newAccessPolicyTemplate,
    newTransformer,
    NotFoundError,
    PlatformClient,
    PlatformError,
    PolicyType,
    resourceByName,
    templateComponent,
    TransformerUUID,
    TransformType,
} from '../src';
import {runSample, SampleError} from './env';

const TEMPLATE_NAME = 'test_template';

async function checkAccessPolicies(client: PlatformClient): Promise<void> {
  const template = await client.accessPolicyTemplates.create(
    newAccessPolicyTemplate(TEMPLATE_NAME, 'function policy(context, params) { return false; }'),
    { ifNotExists: true }
  );

  const policy = await client.accessPolicies.create(
    newAccessPolicy({
      name: 'test_access_policy',
      policy_type: PolicyType.COMPOSITE_AND,
      components: [templateComponent(resourceByName(TEMPLATE_NAME), '{}')],
    }),
    { ifNotExists: true }
  );

  const policies = await client.accessPolicies.list();
  if (!policies.some((ap) => matchesResource(ap, AccessPolicyOpen))) {
    throw new SampleError('missing AccessPolicyOpen in list');
  }
  if (!policies.some((ap) => ap.id === policy.id)) {
    throw new SampleError('missing new access policy in list');
  }

  const updated = await client.accessPolicies.update({
    ...policy,
    components: [templateComponent(resourceByName(TEMPLATE_NAME), '{"foo": "bar"}')],
  });
  if (updated.version !== policy.version + 1) {
    throw new SampleError(
      `update changed version from ${policy.version} to ${updated.version}, expected +1`
    );
  }

  if (!(await client.accessPolicies.delete(updated.id, updated.version))) {
    throw new SampleError('failed to delete access policy but no error');
  }

  // deleting the latest version leaves the original in place
  const remaining = await client.accessPolicies.list();
  const original = remaining.find((ap) => ap.id === updated.id);
  if (!original || original.version !== 0) {
    throw new SampleError(`expected access policy version 0 after delete, got ${original?.version}`);
  }

  if (!(await client.accessPolicies.delete(updated.id, 0))) {
    throw new SampleError('failed to delete access policy but no error');
  }
  if (!(await client.accessPolicyTemplates.delete(template.id, 0))) {
    throw new SampleError('failed to delete access policy template but no error');
  }
}

async function checkTransformers(client: PlatformClient): Promise<void> {
  const transformer = await client.transformers.create(
    newTransformer({
      name: 'test_transformer',
      input_type: DataType.STRING,
      transform_type: TransformType.TRANSFORM,
      function: "function transform(data, params) { return 'token'; }",
      parameters: '{}',
    }),
    { ifNotExists: true }
  );

  const transformers = await client.transformers.list();
  if (!transformers.some((t) => matchesResource(t, TransformerUUID))) {
    throw new SampleError('missing TransformerUUID in list');
  }
  if (!transformers.some((t) => t.id === transformer.id)) {
    throw new SampleError('missing new transformer in list');
  }

  if (!(await client.transformers.delete(transformer.id))) {
    throw new SampleError('failed to delete transformer but no error');
  }
}

async function checkTokens(client: PlatformClient): Promise<void> {
  const originalData = 'something very secret';
  const token = await client.tokens.create(originalData, TransformerUUID, AccessPolicyOpen);
  console.log(`Token: ${token}`);

  const resolved = await client.tokens.resolve([token], {}, []);
  if (resolved.length !== 1 || resolved[0].data !== originalData) {
    throw new SampleError(`resolving ${token} did not return the original data`);
  }
  console.log(`Data: ${resolved[0].data}`);

  const lookupTokens = await client.tokens.lookup(originalData, TransformerUUID, AccessPolicyOpen);
  if (!lookupTokens.includes(token)) {
    throw new SampleError(`expected lookup tokens ${lookupTokens.join(', ')} to contain ${token}`);
  }

  const inspected = await client.tokens.inspect(token);
  if (inspected.token !== token) {
    throw new SampleError(`expected inspected token ${inspected.token} to match ${token}`);
  }
  if (!matchesResource(inspected.transformer, TransformerUUID)) {
    throw new SampleError(`token was issued by transformer ${inspected.transformer.name}`);
  }
  if (!matchesResource(inspected.access_policy, AccessPolicyOpen)) {
    throw new SampleError(`token is governed by access policy ${inspected.access_policy.name}`);
  }

  if (!(await client.tokens.delete(token))) {
    throw new SampleError('failed to delete token but no error');
  }
}

async function checkErrorHandling(client: PlatformClient): Promise<void> {
  let data: unknown;
  try {
    data = await client.tokens.resolve(['not a token'], {}, []);
  } catch (error) {
    if (error instanceof NotFoundError) {
      return;
    }
    if (error instanceof PlatformError) {
      throw new SampleError(`got unexpected error resolving a bogus token (wanted 404): ${String(error)}`);
    }
    throw error;
  }
  throw new SampleError(`expected error but got data: ${JSON.stringify(data)}`);
}

export async function runTokenizerSample(client: PlatformClient): Promise<void> {
  await checkAccessPolicies(client);
  await checkTransformers(client);
  await checkTokens(client);
  await checkErrorHandling(client);
  console.log('tokenizer sample completed');
}

if (require.main === module) {
  runSample(runTokenizerSample).catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });
}
