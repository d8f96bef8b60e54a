import type { PhaseRunner } from '../../engine/phaseMachine.js';
import { pickRandom } from '../../utils.js';
import { MISSIONS } from './roles.js';
import type { ParanoiaEngine } from './engine.js';

export function missionTeamSize(alive: number): number {
  return Math.min(alive, Math.max(2, Math.ceil(alive / 2)));
}

export function announceMissionResult(succeeded: boolean, sabotages: number): string {
  const attempts = `${sabotages} sabotage attempt(s).`;
  return succeeded
    ? `MISSION SUCCESS! The Computer is pleased with your loyalty. But remain vigilant for traitors. ${attempts}`
    : `MISSION FAILURE! The Computer is displeased. Someone is clearly a traitor. ${attempts}`;
}

/** The rotating leader picks a team; any traitor on it may sabotage. One sabotage fails the mission. */
export class MissionPhase implements PhaseRunner<ParanoiaEngine> {
  readonly name = 'mission';

  async run(engine: ParanoiaEngine): Promise<void> {
    const alive = engine.aliveNames();
    const leader = engine.nextLeader();
    const size = missionTeamSize(alive.length);
    const mission = pickRandom(MISSIONS, engine.rng) ?? MISSIONS[0];

    engine.recordPublic({
      type: 'SYSTEM',
      content: `THE COMPUTER ASSIGNS A MISSION: ${mission.toUpperCase()}. Team leader: ${leader}.`,
      metadata: { kind: 'mission' },
    });

    const team = await engine.agentIO.decideMany(leader, {
      kind: 'team',
      prompt: `Mission: ${mission}. Choose exactly ${size} players for the team (you may include yourself).`,
      options: alive,
      min: size,
      max: size,
    });
    engine.recordPublic({ type: 'ACTION', player: leader, content: `picks the team: ${team.join(', ')}.`, metadata: { kind: 'team' } });

    const traitors = team.filter(n => engine.roster.require(n).team === 'Traitors');
    const choices = await Promise.all(
      traitors.map(t =>
        engine.agentIO.decide(t, {
          kind: 'mission',
          prompt: `You are on the mission team: ${team.join(', ')}. SUPPORT the mission or secretly SABOTAGE it?`,
          options: ['SUPPORT', 'SABOTAGE'],
        })
      )
    );
    traitors.forEach((t, i) => {
      engine.recordFaction('Traitors', { type: 'ACTION', player: t, content: `chooses ${choices[i] ?? 'SUPPORT'}`, metadata: { kind: 'mission' } });
    });

    const sabotages = choices.filter(c => c === 'SABOTAGE').length;
    const succeeded = sabotages === 0;
    engine.lastMissionFailed = !succeeded;
    if (succeeded) engine.missions.successes++;
    else engine.missions.failures++;
    engine.missionHistory.push({ round: engine.state.counters.round, mission, leader, team, sabotages, succeeded });

    engine.recordPublic({
      type: 'SYSTEM',
      content: announceMissionResult(succeeded, sabotages),
      metadata: { kind: 'mission_result', result: succeeded ? 'succeeded' : 'failed' },
    });
    engine.considerTermination();
  }
}
