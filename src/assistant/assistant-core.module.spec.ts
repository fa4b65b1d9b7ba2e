import { Test } from '@nestjs/testing';
import { AssistantCoreModule } from './assistant-core.module';
import { AssistantService } from './assistant.service';

describe('AssistantCoreModule', () => {
  const compileWith = async (config: Record<string, unknown>) =>
    Test.createTestingModule({
      imports: [AssistantCoreModule.forRoot({ config })],
    }).compile();

  it('boots with valid programmatic config', async () => {
    const moduleRef = await compileWith({
      ASSISTANT_DB_PATH: ':memory:',
      WEATHER_TTL_SECONDS: 600,
    });

    expect(moduleRef.get(AssistantService)).toBeInstanceOf(AssistantService);
    await moduleRef.close();
  });

  it('rejects a non-positive TTL', async () => {
    await expect(
      compileWith({ ASSISTANT_DB_PATH: ':memory:', WEATHER_TTL_SECONDS: 0 }),
    ).rejects.toThrow(/Invalid assistant configuration/);
  });

  it('rejects an out-of-range threshold', async () => {
    await expect(
      compileWith({ ASSISTANT_DB_PATH: ':memory:', INTENT_ACCEPTANCE_THRESHOLD: 7 }),
    ).rejects.toThrow(/Invalid assistant configuration/);
  });
});
