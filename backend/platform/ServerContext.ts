import { ComponentFinder } from '../component/ComponentFinder';
import type { ServerConfig } from '../config/ServerConfig';
import type { DbClient } from '../db/DbClient';
import { Languages } from '../languages/Languages';
import { QualityProfilesService } from '../modules/qualityprofiles/qualityprofiles.service';
import { OrganizationSupport } from '../organization/OrganizationSupport';
import { QualityProfileFinder } from '../qualityprofile/QualityProfileFinder';
import { QualityProfileResolver } from '../qualityprofile/QualityProfileResolver';
import { RuleIndex } from '../rule/RuleIndex';
import { RuleIndexer } from '../rule/RuleIndexer';
import { ClearRulesOverloadedDebt } from '../startup/ClearRulesOverloadedDebt';
import { StartupTaskRunner } from '../startup/StartupTaskRunner';
import { telemetryStore, type TelemetryStore } from '../telemetry/TelemetryStore';
import { systemClock, type Clock } from './Clock';

export type ServerContext = {
  config: ServerConfig;
  dbClient: DbClient;
  clock: Clock;
  languages: Languages;
  resolver: QualityProfileResolver;
  qualityProfiles: QualityProfilesService;
  ruleIndex: RuleIndex;
  ruleIndexer: RuleIndexer;
  startupTasks: StartupTaskRunner;
  telemetryStore: TelemetryStore;
};

/**
 * Composition root: every component is built once here and handed its
 * collaborators explicitly.
 */
export function createServerContext(args: {
  config: ServerConfig;
  dbClient: DbClient;
  clock?: Clock;
}): ServerContext {
  const { config, dbClient } = args;
  const clock = args.clock ?? systemClock;

  const languages = new Languages(config.languages);
  const resolver = new QualityProfileResolver({
    languages,
    organizations: new OrganizationSupport(config.defaultOrganizationKey),
    components: new ComponentFinder(),
    profiles: new QualityProfileFinder(languages),
  });

  const ruleIndex = new RuleIndex();
  const ruleIndexer = new RuleIndexer(dbClient, ruleIndex, clock);

  const startupTasks = new StartupTaskRunner().register(
    new ClearRulesOverloadedDebt({ dbClient, ruleIndexer, clock }),
  );

  return {
    config,
    dbClient,
    clock,
    languages,
    resolver,
    qualityProfiles: new QualityProfilesService({
      dbClient,
      languages,
      resolver,
    }),
    ruleIndex,
    ruleIndexer,
    startupTasks,
    telemetryStore,
  };
}
