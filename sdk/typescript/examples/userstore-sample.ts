/**
 * Userstore sample
 *
 * Creates columns and the access policies governing them, then creates,
 * executes and deletes accessors (read APIs) and mutators (write APIs).
 */

import {
    AccessPolicyOpen,
    ColumnIndexType,
    DataLifeCycleState,
    DataType,
    DurationUnit,
    NIL_UUID,
    newAccessor,
    newAccessPolicy,
    newAccessPolicyTemplate,
    newColumn,
    newColumnRetentionDuration,
    newMutator,
    newPurpose,
    newTransformer,
    NormalizerOpen,
    NotFoundError,
    parseAccessorRows,
    PlatformClient,
    PolicyType,
    resourceById,
    resourceByName,
    retentionDuration,
    selector,
    templateComponent,
    TransformerPassThrough,
    TransformType,
} from '../src';
import type {
    Accessor,
    ColumnOutputConfig,
    ColumnRetentionDuration,
    ColumnValue,
    Mutator,
    ResourceID,
} from '../src';
import {runSample, sampleRegion, SampleError} from './env';

const PHONE_NUMBER_COLUMN = 'phone_number';
const EMAIL_COLUMN = 'email';
const SECURITY_PURPOSE = 'security';

const PHONE_TRANSFORMER_FUNCTION = String.raw`
function transform(data, params) {
    if (params.team == "security_team") {
        return data;
    } else if (params.team == "support_team") {
        phone = /^(\d{3})-(\d{3})-(\d{4})$/.exec(data);
        if (phone) {
            return "XXX-XXX-"+phone[3];
        } else {
            return "<invalid phone number>";
        }
    }
    return "";
}`;

const PHONE_TOKENIZING_FUNCTION = String.raw`
function id(len) {
    var s = "0123456789";
    return Array(len).join().split(',').map(function() {
        return s.charAt(Math.floor(Math.random() * s.length));
    }).join('');
}
function validate(str) {
    return (str.length === 10);
}
function transform(data, params) {
    data = data.replace(/\D/g, '');
    if (data.length === 11) {
        data = data.substr(1, 11);
    }
    if (!validate(data)) {
        throw new Error('Invalid US Phone Number Provided');
    }
    return '1' + id(10);
}`;

interface Fixtures {
  supportAccessor: Accessor;
  securityAccessor: Accessor;
  marketingAccessor: Accessor;
  loggingAccessor: Accessor;
  phoneAddressMutator: Mutator;
  emailMutator: Mutator;
}

function passThrough(column: string): ColumnOutputConfig {
  return { column: resourceByName(column), transformer: TransformerPassThrough };
}

function piiColumns(phoneTransformer: ResourceID): ColumnOutputConfig[] {
  return [
    { column: resourceByName(PHONE_NUMBER_COLUMN), transformer: phoneTransformer },
    passThrough('home_addresses'),
    passThrough('created'),
    passThrough('id'),
    passThrough('usa_address'),
  ];
}

function withPurposes(value: string, purposes: string[]): ColumnValue {
  return { value, purpose_additions: purposes.map((name) => resourceByName(name)) };
}

async function setupColumns(client: PlatformClient): Promise<string> {
  // column CRUD
  let column = await client.columns.create(
    newColumn({ name: 'temp_column', type: DataType.BOOLEAN }),
    { ifNotExists: true }
  );
  await client.columns.list();
  column = await client.columns.get(column.id);
  await client.columns.update({ ...column, name: 'temp_column_renamed' });
  await client.columns.delete(column.id);

  const phoneNumber = await client.columns.create(
    newColumn({ name: PHONE_NUMBER_COLUMN, type: DataType.STRING, index_type: ColumnIndexType.INDEXED }),
    { ifNotExists: true }
  );
  await client.columns.create(
    newColumn({ name: 'home_addresses', type: DataType.ADDRESS, is_array: true }),
    { ifNotExists: true }
  );
  await client.columns.create(
    newColumn({ name: EMAIL_COLUMN, type: DataType.STRING, index_type: ColumnIndexType.INDEXED }),
    { ifNotExists: true }
  );
  await client.columns.create(
    newColumn({
      name: 'usa_address',
      type: DataType.COMPOSITE,
      constraints: {
        immutable_required: false,
        unique_id_required: false,
        unique_required: false,
        fields: ['Street_Address', 'City', 'State', 'Zip'].map((name) => ({
          type: DataType.STRING,
          name,
        })),
      },
    }),
    { ifNotExists: true }
  );

  return phoneNumber.id;
}

async function setupPurposes(client: PlatformClient): Promise<{ security: string; support: string }> {
  // purpose CRUD
  let purpose = await client.purposes.create(
    newPurpose('temp_purpose', 'temp_purpose_description'),
    { ifNotExists: true }
  );
  await client.purposes.list();
  purpose = await client.purposes.get(purpose.id);
  await client.purposes.update({ ...purpose, description: 'new description' });
  await client.purposes.delete(purpose.id);

  const security = await client.purposes.create(
    newPurpose(SECURITY_PURPOSE, 'Allows access to the data in the columns for security purposes'),
    { ifNotExists: true }
  );
  const support = await client.purposes.create(
    newPurpose('support', 'Allows access to the data in the columns for support purposes'),
    { ifNotExists: true }
  );
  await client.purposes.create(
    newPurpose('marketing', 'Allows access to the data in the columns for marketing purposes'),
    { ifNotExists: true }
  );

  return { security: security.id, support: support.id };
}

async function setupRetentionDurations(
  client: PlatformClient,
  phoneNumberId: string,
  purposes: { security: string; support: string }
): Promise<void> {
  const existing = await client.retentionDurations.getAllOnColumn(phoneNumberId);
  for (const rd of existing.retention_durations) {
    if (rd.id !== NIL_UUID) {
      await client.retentionDurations.deleteOnColumn(phoneNumberId, rd.id);
    }
  }

  // soft-deleted phone numbers with a support purpose are kept for 3 months
  await client.retentionDurations.updateAllOnColumn(phoneNumberId, [
    newColumnRetentionDuration({
      duration_type: DataLifeCycleState.SOFT_DELETED,
      duration: retentionDuration(DurationUnit.MONTH, 3),
      column_id: phoneNumberId,
      purpose_id: purposes.support,
    }),
  ]);

  try {
    const tenantDefault = await client.retentionDurations.getDefaultOnTenant();
    if (tenantDefault.retention_duration.id !== NIL_UUID) {
      await client.retentionDurations.deleteOnTenant(tenantDefault.retention_duration.id);
    }
  } catch (error) {
    if (!(error instanceof NotFoundError)) {
      throw error;
    }
  }

  // everything else soft-deleted is kept for a week
  await client.retentionDurations.createOnTenant(
    newColumnRetentionDuration({
      duration_type: DataLifeCycleState.SOFT_DELETED,
      duration: retentionDuration(DurationUnit.WEEK, 1),
    })
  );

  try {
    const purposeDefault = await client.retentionDurations.getDefaultOnPurpose(purposes.security);
    if (purposeDefault.retention_duration.id !== NIL_UUID) {
      await client.retentionDurations.deleteOnPurpose(
        purposes.security,
        purposeDefault.retention_duration.id
      );
    }
  } catch (error) {
    if (!(error instanceof NotFoundError)) {
      throw error;
    }
  }

  // values with a security purpose are kept for a year
  await client.retentionDurations.createOnPurpose(
    purposes.security,
    newColumnRetentionDuration({
      duration_type: DataLifeCycleState.SOFT_DELETED,
      duration: retentionDuration(DurationUnit.YEAR, 1),
      purpose_id: purposes.security,
    })
  );

  const configured = await client.retentionDurations.getAllOnColumn(phoneNumberId);
  console.log('phone_number retention durations post-configuration:', JSON.stringify(configured));
}

async function setup(client: PlatformClient): Promise<Fixtures> {
  const phoneNumberId = await setupColumns(client);
  const purposes = await setupPurposes(client);
  await setupRetentionDurations(client, phoneNumberId, purposes);

  // access is granted to the security and support teams
  await client.accessPolicyTemplates.create(
    newAccessPolicyTemplate(
      'PIIAccessPolicyTemplate',
      `function policy(context, params) {
            return params.teams.includes(context.client.team);
        }`
    ),
    { ifNotExists: true }
  );
  const policy = await client.accessPolicies.create(
    newAccessPolicy({
      name: 'PIIAccessForSecurityandSupport',
      policy_type: PolicyType.COMPOSITE_AND,
      components: [
        templateComponent(
          resourceByName('PIIAccessPolicyTemplate'),
          '{"teams": ["security_team", "support_team"]}'
        ),
      ],
    }),
    { ifNotExists: true }
  );

  const supportTransformer = await client.transformers.create(
    newTransformer({
      name: 'PIITransformerForSupport',
      input_type: DataType.STRING,
      transform_type: TransformType.TRANSFORM,
      function: PHONE_TRANSFORMER_FUNCTION,
      parameters: '{"team": "support_team"}',
    }),
    { ifNotExists: true }
  );
  const securityTransformer = await client.transformers.create(
    newTransformer({
      name: 'PIITransformerForSecurity',
      input_type: DataType.STRING,
      transform_type: TransformType.TRANSFORM,
      function: PHONE_TRANSFORMER_FUNCTION,
      parameters: '{"team": "security_team"}',
    }),
    { ifNotExists: true }
  );
  // reuse_existing_token returns the same token for the same phone number on every call
  const loggingTransformer = await client.transformers.create(
    newTransformer({
      name: 'PIITransformerForLogging',
      input_type: DataType.STRING,
      reuse_existing_token: true,
      transform_type: TransformType.TOKENIZE_BY_VALUE,
      function: PHONE_TOKENIZING_FUNCTION,
      parameters: '{"team": "security_team"}',
    }),
    { ifNotExists: true }
  );

  // Accessors are use-case specific read APIs. Their selector is a where clause over column names.
  let supportAccessor = await client.accessors.create(
    newAccessor({
      name: 'PIIAccessor-SupportTeam',
      description: 'Accessor for support team',
      columns: piiColumns(resourceById(supportTransformer.id)),
      access_policy: resourceById(policy.id),
      selector_config: selector('{id} = ?'),
      purposes: [resourceByName('support')],
      data_life_cycle_state: DataLifeCycleState.LIVE,
    }),
    { ifNotExists: true }
  );
  supportAccessor = await client.accessors.update({ ...supportAccessor, description: 'New Name' });
  supportAccessor = await client.accessors.update({
    ...supportAccessor,
    description: 'Accessor for support team',
  });
  supportAccessor = await client.accessors.get(supportAccessor.id);
  await client.accessors.list();

  const securityAccessor = await client.accessors.create(
    newAccessor({
      name: 'PIIAccessor-SecurityTeam',
      description: 'Accessor for security team',
      columns: piiColumns(resourceById(securityTransformer.id)),
      access_policy: resourceById(policy.id),
      selector_config: selector(
        "{home_addresses}->>'street_address_line_1' LIKE (?) AND {phone_number} = (?)"
      ),
      purposes: [resourceByName(SECURITY_PURPOSE)],
      data_life_cycle_state: DataLifeCycleState.LIVE,
    }),
    { ifNotExists: true }
  );

  const marketingAccessor = await client.accessors.create(
    newAccessor({
      name: 'PIIAccessor-MarketingTeam',
      description: 'Accessor for marketing team',
      columns: piiColumns(TransformerPassThrough),
      access_policy: AccessPolicyOpen,
      selector_config: selector('{id} = ?'),
      purposes: [resourceByName(SECURITY_PURPOSE)],
      data_life_cycle_state: DataLifeCycleState.LIVE,
    }),
    { ifNotExists: true }
  );

  const loggingAccessor = await client.accessors.create(
    newAccessor({
      name: 'PhoneTokenAccessorForSecurityTeam',
      description: 'Accessor for getting phone number token for security team',
      columns: [
        { column: resourceByName(PHONE_NUMBER_COLUMN), transformer: resourceById(loggingTransformer.id) },
      ],
      access_policy: AccessPolicyOpen,
      token_access_policy: AccessPolicyOpen,
      selector_config: selector('{id} = ?'),
      purposes: [resourceByName(SECURITY_PURPOSE)],
      data_life_cycle_state: DataLifeCycleState.LIVE,
    }),
    { ifNotExists: true }
  );

  // Mutators are the write-side complement of accessors
  let phoneAddressMutator = await client.mutators.create(
    newMutator({
      name: 'PhoneAndAddressMutator',
      description: 'Mutator for updating phone number and home address',
      columns: [PHONE_NUMBER_COLUMN, 'home_addresses', 'usa_address'].map((name) => ({
        column: resourceByName(name),
        normalizer: NormalizerOpen,
      })),
      access_policy: AccessPolicyOpen,
      selector_config: selector('{id} = ?'),
    }),
    { ifNotExists: true }
  );
  phoneAddressMutator = await client.mutators.update({
    ...phoneAddressMutator,
    description: 'New description',
  });
  phoneAddressMutator = await client.mutators.update({
    ...phoneAddressMutator,
    description: 'Mutator for updating phone number and home address',
  });
  phoneAddressMutator = await client.mutators.get(phoneAddressMutator.id);
  await client.mutators.list();

  const emailMutator = await client.mutators.create(
    newMutator({
      name: 'EmailMutator',
      description: 'Mutator for updating email',
      columns: [{ column: resourceByName(EMAIL_COLUMN), normalizer: NormalizerOpen }],
      access_policy: AccessPolicyOpen,
      selector_config: selector('{id} = ?'),
    }),
    { ifNotExists: true }
  );

  return {
    supportAccessor,
    securityAccessor,
    marketingAccessor,
    loggingAccessor,
    phoneAddressMutator,
    emailMutator,
  };
}

async function userstoreExample(client: PlatformClient, region: string, fixtures: Fixtures): Promise<void> {
  const email = 'me@example.org';

  for (const user of await client.users.list({ email })) {
    await client.users.delete(user.id);
  }

  // reading and writing the profile directly, without accessors or mutators
  let uid = await client.users.create();
  const user = await client.users.get(uid);
  await client.users.update(uid, {
    ...user.profile,
    [EMAIL_COLUMN]: email,
    [PHONE_NUMBER_COLUMN]: '123-456-7890',
  });
  console.log("old way: user's details are", JSON.stringify((await client.users.get(uid)).profile));
  await client.users.delete(uid);

  uid = await client.users.createWithMutator(
    fixtures.emailMutator.id,
    {},
    { [EMAIL_COLUMN]: withPurposes(email, ['operational']) },
    region
  );

  const purposes = [SECURITY_PURPOSE, 'support', 'operational'];
  await client.mutators.execute(fixtures.phoneAddressMutator.id, {}, [uid], {
    [PHONE_NUMBER_COLUMN]: withPurposes('123-456-7890', purposes),
    home_addresses: withPurposes(
      '[{"country":"usa", "street_address_line_1":"742 Evergreen Terrace", "locality":"Springfield"}, ' +
        '{"country":"usa", "street_address_line_1":"123 Main St", "locality":"Pleasantville"}]',
      purposes
    ),
    usa_address: withPurposes(
      '{"street_address":"742 Evergreen Terrace","city":"Springfield","state":"IL","zip":"62704"}',
      purposes
    ),
  });

  // masked phone number
  let resolved = await client.accessors.execute(fixtures.supportAccessor.id, { team: 'support_team' }, [uid]);
  console.log("support context: user's details are", JSON.stringify(parseAccessorRows(resolved)));

  // full details
  resolved = await client.accessors.execute(
    fixtures.securityAccessor.id,
    { team: 'security_team' },
    ['%Evergreen%', '123-456-7890']
  );
  console.log("security context: user's details are", JSON.stringify(parseAccessorRows(resolved)));

  // no rows: the policy does not admit the marketing team
  resolved = await client.accessors.execute(fixtures.marketingAccessor.id, { team: 'marketing_team' }, [uid]);
  console.log("marketing context: user's details are", JSON.stringify(parseAccessorRows(resolved)));

  const phoneToken = async (): Promise<string> => {
    const result = await client.accessors.execute(fixtures.loggingAccessor.id, { team: 'security_team' }, [uid]);
    const [row] = parseAccessorRows(result);
    const token = row?.[PHONE_NUMBER_COLUMN];
    if (typeof token !== 'string') {
      throw new SampleError('logging accessor returned no phone token');
    }
    return token;
  };

  const token = await phoneToken();
  console.log(`user's phone token (first call) ${token}`);
  const repeated = await phoneToken();
  console.log(`user's phone token (repeat call) ${repeated}`);
  if (repeated !== token) {
    throw new SampleError('expected the logging transformer to reuse its token');
  }

  const value = await client.tokens.resolve(
    [token],
    { team: 'security_team' },
    [resourceByName(SECURITY_PURPOSE)]
  );
  console.log("user's phone token resolved", JSON.stringify(value));

  await client.users.delete(uid);
}

async function cleanRetentionDurations(client: PlatformClient): Promise<void> {
  const column = (await client.columns.list()).find((col) => col.name === PHONE_NUMBER_COLUMN);
  const purpose = (await client.purposes.list()).find((p) => p.name === SECURITY_PURPOSE);

  const created: ColumnRetentionDuration[] = [];
  if (column) {
    created.push(...(await client.retentionDurations.getAllOnColumn(column.id)).retention_durations);
  } else {
    console.warn(`Failed to find column - ${PHONE_NUMBER_COLUMN}`);
  }
  created.push((await client.retentionDurations.getDefaultOnTenant()).retention_duration);
  if (purpose) {
    created.push((await client.retentionDurations.getDefaultOnPurpose(purpose.id)).retention_duration);
  } else {
    console.warn(`Failed to find purpose - ${SECURITY_PURPOSE}`);
  }

  for (const rd of created) {
    if (rd.id === NIL_UUID) {
      continue;
    }
    let deleted: boolean;
    if (rd.column_id !== NIL_UUID) {
      deleted = await client.retentionDurations.deleteOnColumn(rd.column_id, rd.id);
    } else if (rd.purpose_id !== NIL_UUID) {
      deleted = await client.retentionDurations.deleteOnPurpose(rd.purpose_id, rd.id);
    } else {
      deleted = await client.retentionDurations.deleteOnTenant(rd.id);
    }
    if (!deleted) {
      console.warn(`Failed to delete retention duration ${rd.id}`);
    }
  }
}

async function cleanup(client: PlatformClient, fixtures: Fixtures): Promise<void> {
  const accessors = [
    fixtures.supportAccessor,
    fixtures.securityAccessor,
    fixtures.marketingAccessor,
    fixtures.loggingAccessor,
  ];
  for (const accessor of accessors) {
    if (!(await client.accessors.delete(accessor.id))) {
      console.warn(`Failed to delete accessor ${accessor.name} (${accessor.id})`);
    }
  }
  for (const mutator of [fixtures.phoneAddressMutator, fixtures.emailMutator]) {
    if (!(await client.mutators.delete(mutator.id))) {
      console.warn(`Failed to delete mutator ${mutator.name} (${mutator.id})`);
    }
  }

  await cleanRetentionDurations(client);
}

async function printUserstoreStats(client: PlatformClient): Promise<void> {
  const [columns, purposes, templates, policies, transformers, accessors, mutators] = await Promise.all([
    client.columns.list(),
    client.purposes.list(),
    client.accessPolicyTemplates.list(),
    client.accessPolicies.list(),
    client.transformers.list(),
    client.accessors.list(),
    client.mutators.list(),
  ]);
  console.log('Userstore stats:');
  console.log(`num columns: ${columns.length}`);
  console.log(`num purposes: ${purposes.length}`);
  console.log(`num access policy templates: ${templates.length}`);
  console.log(`num access policies: ${policies.length}`);
  console.log(`num transformers: ${transformers.length}`);
  console.log(`num accessors: ${accessors.length}`);
  console.log(`num mutators: ${mutators.length}`);
}

export async function runUserstoreSample(client: PlatformClient, region = sampleRegion()): Promise<void> {
  const fixtures = await setup(client);
  await userstoreExample(client, region, fixtures);
  await cleanup(client, fixtures);
  await printUserstoreStats(client);
}

if (require.main === module) {
  runSample((client) => runUserstoreSample(client)).catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });
}
