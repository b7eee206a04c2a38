import 'reflect-metadata';
import { container } from 'tsyringe';
import { INewsProvider } from '../adapters/news/news-provider.interface';
import { JsonNewsFeedAdapter } from '../adapters/news/json-news-feed.adapter';
import { IReferenceDataAdapter } from '../adapters/reference/reference-data-adapter.interface';
import { JsonReferenceDataAdapter } from '../adapters/reference/json-reference-data.adapter';
import { IWeatherProvider } from '../adapters/weather/weather-provider.interface';
import { OpenMeteoWeatherProvider } from '../adapters/weather/open-meteo.provider';
import { INewsIntelligence } from '../services/news-intelligence.interface';
import { NewsIntelligenceService } from '../services/news-intelligence.service';
import { IRiskAssessor } from '../services/risk-assessor.interface';
import { OpenAIRiskAssessorService } from '../services/openai-risk-assessor.service';
import { IMitigationAdvisor } from '../services/mitigation-advisor.interface';
import { OpenAIMitigationAdvisorService } from '../services/openai-mitigation-advisor.service';
import { ChatCompletionsClient, createChatCompletionsClient } from '../utils/chat-completion.util';
import { Clock } from '../services/route-risk.service';
import { AppConfig } from './app.config';

/**
 * Registers every dependency. Reference tables are loaded here, once,
 * so a bad data file fails startup instead of the first request.
 */
export async function setupDI(config: AppConfig): Promise<void> {
  // Register configuration values
  container.register('AppConfig', { useValue: config });
  container.register('ReferenceDataPath', { useValue: config.data.referencePath });
  container.register('NewsFeedPath', { useValue: config.data.newsFeedPath });
  container.register<Clock>('Clock', { useValue: () => new Date() });

  // Register adapters
  container.register<IReferenceDataAdapter>('IReferenceDataAdapter', {
    useClass: JsonReferenceDataAdapter
  });

  container.register<IWeatherProvider>('IWeatherProvider', {
    useClass: OpenMeteoWeatherProvider
  });

  container.register<INewsProvider>('INewsProvider', {
    useClass: JsonNewsFeedAdapter
  });

  container.register<ChatCompletionsClient>('ChatCompletionsClient', {
    useValue: createChatCompletionsClient(config)
  });

  // Register services
  container.register<INewsIntelligence>('INewsIntelligence', {
    useClass: NewsIntelligenceService
  });

  container.register<IRiskAssessor>('IRiskAssessor', {
    useClass: OpenAIRiskAssessorService
  });

  container.register<IMitigationAdvisor>('IMitigationAdvisor', {
    useClass: OpenAIMitigationAdvisorService
  });

  const tables = await container.resolve<IReferenceDataAdapter>('IReferenceDataAdapter').load();
  container.register('ReferenceTables', { useValue: tables });
}
