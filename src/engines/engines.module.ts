import { Module } from '@nestjs/common'
import { ProfileEngine } from './profile/profile.engine'
import { TechnicalEngine } from './technical/technical.engine'
import { SoftSkillsEngine } from './soft-skills/soft-skills.engine'
import { DecisionEngine } from './decision/decision.engine'
import { SCORING_CONFIG, scoringConfigFromEnv } from '../shared/scoring-config'

@Module({
  providers: [
    ProfileEngine,
    TechnicalEngine,
    SoftSkillsEngine,
    DecisionEngine,
    {
      provide: SCORING_CONFIG,
      useFactory: scoringConfigFromEnv,
    },
  ],
  exports: [ProfileEngine, TechnicalEngine, SoftSkillsEngine, DecisionEngine, SCORING_CONFIG],
})
export class EnginesModule {}
