import { injectable } from 'tsyringe';
import { MitigationPlan, MitigationRequest } from '../types/mitigation.types';

const HIGH_COMBINED_RISK = 12;
const HIGH_WEATHER_RISK = 7;

/**
 * Generic plan used when the advisor cannot answer. Only the two risk scores
 * shape it; everything else is standing advice.
 */
@injectable()
export class MitigationFallbackPlanner {
  plan(request: MitigationRequest): MitigationPlan {
    const weatherScore = request.weatherConditions.riskScore;
    const geopoliticalScore = request.geopoliticalConditions.riskScore;
    const overall = weatherScore + geopoliticalScore > HIGH_COMBINED_RISK ? 'High' : 'Medium';

    return {
      overallRiskAssessment: `${overall} risk level detected based on weather (score: ${weatherScore}) ` +
        `and geopolitical conditions (score: ${geopoliticalScore})`,
      recommendedAction: 'Review detailed analysis and implement suggested mitigation strategies',
      strategies: [
        {
          strategyType: 'Weather Mitigation',
          priority: weatherScore > HIGH_WEATHER_RISK ? 'High' : 'Medium',
          description: 'Monitor weather conditions closely and consider route adjustments',
          implementationTime: '1-2 days',
          costImpact: 'minimal to moderate',
          riskReduction: '20-40%'
        }
      ],
      alternativeRoutes: [],
      timelineRecommendations: 'Review conditions 24-48 hours before departure',
      complianceChecks: ['Verify carrier insurance', 'Check cargo documentation']
    };
  }
}
