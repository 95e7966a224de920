import type { DbSession } from '../db/DbClient';
import type { ComponentRecord } from '../db/records';
import { notFound } from '../reliability/DomainError';

export const isRootProject = (component: ComponentRecord): boolean =>
  component.scope === 'PRJ' && component.moduleUuid === null;

export class ComponentFinder {
  async getByKey(session: DbSession, key: string): Promise<ComponentRecord> {
    const component = await session.components.selectByKey(key);
    if (!component) {
      throw notFound(`Component key '${key}' not found.`, { componentKey: key });
    }
    return component;
  }

  /** The root project of `moduleKey`: itself, or the project its modules roll up to. */
  async getProject(
    session: DbSession,
    moduleKey: string,
  ): Promise<ComponentRecord> {
    const component = await this.getByKey(session, moduleKey);
    if (isRootProject(component)) return component;

    const project = await session.components.selectByUuid(
      component.projectUuid,
    );
    if (!project) {
      throw notFound(`Component id '${component.projectUuid}' not found.`, {
        componentUuid: component.projectUuid,
      });
    }
    return project;
  }
}
