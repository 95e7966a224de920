import { z } from 'zod';

import type {
  ComponentDao,
  LoadedTemplateDao,
  OrganizationDao,
  PropertiesDao,
} from '../DbClient';
import type {
  ComponentRecord,
  LoadedTemplateRecord,
  OrganizationRecord,
  PropertyRecord,
} from '../records';
import {
  ComponentRecordSchema,
  OrganizationRecordSchema,
  PropertyRecordSchema,
} from '../schemas';
import type { CypherRunner } from './Neo4jDbClient';

const CountRowSchema = z.object({ total: z.number() });

export class Neo4jOrganizationDao implements OrganizationDao {
  constructor(private readonly cypher: CypherRunner) {}

  async selectByKey(key: string): Promise<OrganizationRecord | null> {
    const rows = await this.cypher.run(
      `
        MATCH (o:Organization {key: $key})
        RETURN o { .* } AS organization
        LIMIT 1
      `.trim(),
      { key },
    );
    const row = rows[0];
    return row ? OrganizationRecordSchema.parse(row.organization) : null;
  }
}

export class Neo4jComponentDao implements ComponentDao {
  constructor(private readonly cypher: CypherRunner) {}

  private async selectOne(
    property: 'key' | 'uuid',
    value: string,
  ): Promise<ComponentRecord | null> {
    const rows = await this.cypher.run(
      `
        MATCH (c:Component {${property}: $value})
        RETURN c { .* } AS component
        LIMIT 1
      `.trim(),
      { value },
    );
    const row = rows[0];
    return row ? ComponentRecordSchema.parse(row.component) : null;
  }

  selectByKey(key: string) {
    return this.selectOne('key', key);
  }

  selectByUuid(uuid: string) {
    return this.selectOne('uuid', uuid);
  }
}

export class Neo4jPropertiesDao implements PropertiesDao {
  constructor(private readonly cypher: CypherRunner) {}

  async selectGlobalProperty(key: string): Promise<PropertyRecord | null> {
    const rows = await this.cypher.run(
      `
        MATCH (p:Property {key: $key})
        WHERE p.componentUuid IS NULL
        RETURN p { .* } AS property
        LIMIT 1
      `.trim(),
      { key },
    );
    const row = rows[0];
    return row ? PropertyRecordSchema.parse(row.property) : null;
  }
}

export class Neo4jLoadedTemplateDao implements LoadedTemplateDao {
  constructor(private readonly cypher: CypherRunner) {}

  async countByTypeAndKey(type: string, key: string): Promise<number> {
    const rows = await this.cypher.run(
      `
        MATCH (t:LoadedTemplate {type: $type, key: $key})
        RETURN count(t) AS total
      `.trim(),
      { type, key },
    );
    const row = rows[0];
    return row ? CountRowSchema.parse(row).total : 0;
  }

  async insert(template: LoadedTemplateRecord): Promise<void> {
    await this.cypher.run(
      `CREATE (:LoadedTemplate {key: $key, type: $type})`,
      { key: template.key, type: template.type },
    );
  }
}
