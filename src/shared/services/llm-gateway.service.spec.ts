import { z } from 'zod'
import { LlmGatewayService } from './llm-gateway.service'
import { LoggerService } from './logger.service'
import { UnavailableTextGenerator } from './text-generator'
import { FakeTextGenerator } from '../../testing/fixtures'

const request = { operation: 'profileComment', prompt: 'Commente ce profil', fallback: 'Commentaire par défaut.' }

describe('LlmGatewayService', () => {
  describe('complete', () => {
    it('returns the fallback without calling an unavailable model', async () => {
      const gateway = new LlmGatewayService(new UnavailableTextGenerator(), new LoggerService())

      await expect(gateway.complete(request)).resolves.toBe('Commentaire par défaut.')
    })

    it('returns the trimmed completion', async () => {
      const generator = new FakeTextGenerator(async () => '  Profil solide.  \n')
      const gateway = new LlmGatewayService(generator, new LoggerService())

      await expect(gateway.complete(request)).resolves.toBe('Profil solide.')
      expect(generator.prompts).toEqual(['Commente ce profil'])
    })

    it('falls back on an empty completion', async () => {
      const gateway = new LlmGatewayService(new FakeTextGenerator(async () => '   '), new LoggerService())

      await expect(gateway.complete(request)).resolves.toBe('Commentaire par défaut.')
    })

    it('falls back when the model throws', async () => {
      const gateway = new LlmGatewayService(
        new FakeTextGenerator(async () => {
          throw new Error('quota exceeded')
        }),
        new LoggerService(),
      )

      await expect(gateway.complete(request)).resolves.toBe('Commentaire par défaut.')
    })

    it('falls back when the model does not answer in time', async () => {
      const gateway = new LlmGatewayService(
        new FakeTextGenerator(() => new Promise<string>(() => undefined)),
        new LoggerService(),
      )

      await expect(gateway.complete({ ...request, timeoutMs: 10 })).resolves.toBe('Commentaire par défaut.')
    })

    it('logs a warning naming the failed operation', async () => {
      const logger = new LoggerService()
      const warn = jest.spyOn(logger, 'logWarning')
      const gateway = new LlmGatewayService(
        new FakeTextGenerator(async () => {
          throw new Error('quota exceeded')
        }),
        logger,
      )

      await gateway.complete(request)

      expect(warn).toHaveBeenCalledWith('Language model call failed, using deterministic fallback', {
        service: 'LlmGatewayService',
        operation: 'profileComment',
        reason: 'quota exceeded',
      })
    })
  })

  describe('completeJson', () => {
    const schema = z.object({ title: z.string(), experienceMin: z.number().nullable().optional() })
    const jsonRequest = { operation: 'analyzeJob', prompt: 'Analyse cette offre' }

    it('parses a fenced JSON answer', async () => {
      const gateway = new LlmGatewayService(
        new FakeTextGenerator(async () => '```json\n{"title": "Data Scientist", "experienceMin": 2}\n```'),
        new LoggerService(),
      )

      await expect(gateway.completeJson(jsonRequest, schema)).resolves.toEqual({
        title: 'Data Scientist',
        experienceMin: 2,
      })
    })

    it('finds a JSON object embedded in prose', async () => {
      const gateway = new LlmGatewayService(
        new FakeTextGenerator(async () => 'Voici le résultat: {"title": "Data Analyst"} Bonne journée'),
        new LoggerService(),
      )

      await expect(gateway.completeJson(jsonRequest, schema)).resolves.toEqual({ title: 'Data Analyst' })
    })

    it('returns null when the answer does not match the schema', async () => {
      const gateway = new LlmGatewayService(
        new FakeTextGenerator(async () => '{"title": 42}'),
        new LoggerService(),
      )

      await expect(gateway.completeJson(jsonRequest, schema)).resolves.toBeNull()
    })

    it('returns null when the answer holds no JSON', async () => {
      const gateway = new LlmGatewayService(
        new FakeTextGenerator(async () => 'Je ne peux pas répondre.'),
        new LoggerService(),
      )

      await expect(gateway.completeJson(jsonRequest, schema)).resolves.toBeNull()
    })

    it('returns null without a model', async () => {
      const gateway = new LlmGatewayService(new UnavailableTextGenerator(), new LoggerService())

      await expect(gateway.completeJson(jsonRequest, schema)).resolves.toBeNull()
    })
  })
})
