import { describe, expect, it } from 'vitest';
import { Team, TeamClient, parseTeamResponse, toSnakeCase } from '../../src/agent/TeamClient';
import { DomainError, TeamNotFoundError, ValidationError } from '../../src/errors/AgentErrors';
import { logContext } from '../../src/logging/LogContext';
import { InMemoryAgentBackend } from '../helpers/InMemoryAgentBackend';

const members = { agents: [{ name: 'A1', task: 'T1' }], process: 'sequential' as const };

describe('parseTeamResponse', () => {
  it('returns plain text unchanged', () => {
    expect(parseTeamResponse('The answer is 42')).toBe('The answer is 42');
    expect(parseTeamResponse('{not json')).toBe('{not json');
    expect(parseTeamResponse('{"state":"unknown","content":"x"}')).toBe('{"state":"unknown","content":"x"}');
  });

  it('recognises a structured envelope', () => {
    const raw = '{"state":"needs_input","content":"Which region?"}';
    expect(parseTeamResponse(raw)).toEqual({ state: 'needs_input', content: 'Which region?', raw });
  });
});

describe('TeamClient', () => {
  it('requires at least one member', async () => {
    const teams = new TeamClient(new InMemoryAgentBackend());

    await expect(teams.create({ name: 'EMPTY', attributes: { agents: [], process: 'sequential' }})).rejects.toThrow(
      'ERR-20053: Invalid Team "EMPTY": "agents" must not be empty',
    );
  });

  it('round-trips the ordered member list', async () => {
    const teams = new TeamClient(new InMemoryAgentBackend());
    const attributes = { agents: [{ name: 'A2', task: 'T2' }, { name: 'A1', task: 'T1' }], process: 'sequential' as const };

    await teams.create({ name: 'TEAM1', attributes });

    const team = await teams.fetch('TEAM1');
    expect(team).toBeInstanceOf(Team);
    expect(team.attributes).toEqual(attributes);
  });

  it('runs a team with the conversation id and extra params in wire form', async () => {
    const backend = new InMemoryAgentBackend();
    const seen: (string | undefined)[] = [];
    backend.responder = (name, prompt) => {
      seen.push(logContext.getStore()?.conversationId);
      return `${name}: ${prompt}`;
    };
    const teams = new TeamClient(backend);
    const team = await teams.create({ name: 'TEAM1', attributes: members });

    const response = await team.run('hello', { conversationId: 'conv-1', maxSteps: 3 });

    expect(response).toBe('TEAM1: hello');
    expect(backend.callsTo('runTeam')[0].args).toEqual([ 'hello', { conversation_id: 'conv-1', max_steps: 3 }]);
    expect(seen).toEqual([ 'conv-1' ]);
    expect(logContext.getStore()).toBeUndefined();
  });

  it('returns the structured response when the team asks for input', async () => {
    const backend = new InMemoryAgentBackend();
    backend.responder = () => '{"state":"needs_input","content":"Which quarter?"}';
    const teams = new TeamClient(backend);
    await teams.create({ name: 'TEAM1', attributes: members });

    const response = await teams.run('TEAM1', 'sales report', { conversationId: 'conv-2' });

    expect(response).toMatchObject({ state: 'needs_input', content: 'Which quarter?' });
  });

  it('requires a conversation id before calling the backend', async () => {
    const backend = new InMemoryAgentBackend();
    const teams = new TeamClient(backend);

    await expect(teams.run('TEAM1', 'hello', { conversationId: '' })).rejects.toThrow(
      new ValidationError('ERR-20053: Invalid Team "TEAM1": "conversationId" is required to run a team', { code: 'ERR-20053' }),
    );
    expect(backend.callsTo('runTeam')).toEqual([]);
  });

  it('surfaces backend failures of a run', async () => {
    const teams = new TeamClient(new InMemoryAgentBackend());
    await expect(teams.run('NOPE', 'hi', { conversationId: 'c' })).rejects.toBeInstanceOf(TeamNotFoundError);

    await teams.create({ name: 'OFF', attributes: members }, { enabled: false });
    const error: unknown = await teams.run('OFF', 'hi', { conversationId: 'c' }).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(DomainError);
    expect(error).toMatchObject({ category: 'invalid_state', message: 'ERR-20053: Team OFF is not enabled' });
  });

  it('rejects a redundant enable', async () => {
    const teams = new TeamClient(new InMemoryAgentBackend());
    const team = await teams.create({ name: 'TEAM1', attributes: members });

    await expect(team.enable()).rejects.toMatchObject({ category: 'invalid_state', code: 'ERR-20053' });
    expect(team.status).toBe('ENABLED');
  });

  it('rejects a process outside the allowed set without calling the backend', async () => {
    const backend = new InMemoryAgentBackend();
    const teams = new TeamClient(backend);
    const team = await teams.create({ name: 'TEAM1', attributes: members });

    await expect(team.setAttribute('process', 'not_a_real_process')).rejects.toThrow(
      new ValidationError('ERR-20053: Invalid Team "TEAM1": "process" must be one of: sequential', { code: 'ERR-20053' }),
    );
    expect(backend.callsTo('setAttribute')).toEqual([]);
    expect(team.attributes).toEqual(members);
  });

  it('rejects an empty member list on setAttribute', async () => {
    const backend = new InMemoryAgentBackend();
    const teams = new TeamClient(backend);
    const team = await teams.create({ name: 'TEAM1', attributes: members });

    await expect(team.setAttribute('agents', [])).rejects.toThrow(
      'ERR-20053: Invalid Team "TEAM1": "agents" must not be empty',
    );
    await expect(teams.setAttribute('TEAM1', 'agents', '[]')).rejects.toBeInstanceOf(ValidationError);
    expect(backend.callsTo('setAttribute')).toEqual([]);
    expect(team.attributes.agents).toEqual([{ name: 'A1', task: 'T1' }]);
  });

  it('rejects a redundant disable', async () => {
    const teams = new TeamClient(new InMemoryAgentBackend());
    const team = await teams.create({ name: 'TEAM1', attributes: members });
    await team.disable();

    await expect(team.disable()).rejects.toMatchObject({
      category: 'invalid_state',
      code: 'ERR-20053',
      message: 'ERR-20053: Team TEAM1 is already disabled',
    });
    expect(team.status).toBe('DISABLED');
  });

  it('fails to drop a team that is already gone', async () => {
    const teams = new TeamClient(new InMemoryAgentBackend());
    const team = await teams.create({ name: 'TEAM1', attributes: members });
    await team.delete();

    const error: unknown = await teams.delete('TEAM1').catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(TeamNotFoundError);
    expect(error).toMatchObject({ code: 'ERR-20053', message: 'ERR-20053: Team TEAM1 does not exist' });
  });

  it('converts param keys to snake case', () => {
    expect(toSnakeCase('conversationId')).toBe('conversation_id');
    expect(toSnakeCase('plain')).toBe('plain');
  });
});
