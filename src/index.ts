import { parseArgs } from 'node:util';
import { PipelineRunRequestSchema } from './application/dto/PipelineRunDTO.js';
import { matchesOf, PERSONA_IDS } from './domain/entities/Persona.js';
import { rankByMatch } from './domain/services/personas/PersonaClassifier.js';
import { AppContainer } from './infrastructure/bootstrap/AppContainer.js';

const { values } = parseArgs({
  options: {
    window: { type: 'string', multiple: true },
    'as-of': { type: 'string' },
    user: { type: 'string', multiple: true },
  },
});

const request = PipelineRunRequestSchema.parse({
  timeWindows: values.window,
  asOf: values['as-of'],
  userIds: values.user,
});

const container = await AppContainer.create();
const summary = await container.pipelineService.run(request);

const { accounts, transactions } = await container.storage.loadLedger(request.userIds);
const userIds = [...new Set([...accounts, ...transactions].map((row) => row.userId))].sort();

console.log(`\n🏁 Pipeline run as of ${summary.asOf}`);
for (const window of summary.windows) {
  const counts = PERSONA_IDS.map((id) => `${id}=${window.personaCounts[id]}`).join(' ');
  console.log(
    `  ${window.timeWindow}: ${window.usersProcessed} users, ${window.recommendationsCreated} recommendations, ` +
      `${window.skipped.length} skipped, ${window.flagged.length} flagged`,
  );
  console.log(`    personas: ${counts}`);

  for (const userId of userIds) {
    const assignment = await container.personaService.current(userId, window.timeWindow);
    if (!assignment) {
      continue;
    }
    const matches = matchesOf(assignment);
    const ranked = rankByMatch(matches)
      .map((id) => `${id} ${matches[id].toFixed(1)}%`)
      .join(', ');
    console.log(`    ${userId} → ${assignment.primaryPersona} (${ranked})`);
  }
}
