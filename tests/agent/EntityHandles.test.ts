import { describe, expect, it } from 'vitest';
import { AgentClient } from '../../src/agent/AgentClient';
import { TaskClient } from '../../src/agent/TaskClient';
import { AgentNotFoundError, ValidationError } from '../../src/errors/AgentErrors';
import { InMemoryAgentBackend } from '../helpers/InMemoryAgentBackend';

describe('entity handles', () => {
  it('defines locally and persists on create', async () => {
    const backend = new InMemoryAgentBackend();
    const tasks = new TaskClient(backend);

    const task = tasks.define({ name: 'T1', attributes: { instruction: 'Summarise' }});
    expect(task.status).toBeUndefined();
    expect(backend.calls).toEqual([]);

    await task.create({ enabled: false });
    expect(task.status).toBe('DISABLED');
    expect(await tasks.status('T1')).toBe('DISABLED');
  });

  it('tracks status through enable and disable', async () => {
    const agents = new AgentClient(new InMemoryAgentBackend());
    const agent = await agents.create({ name: 'A1', attributes: { profileName: 'P1', role: 'Analyst' }});

    await agent.disable();
    expect(agent.status).toBe('DISABLED');
    expect(await agent.currentStatus()).toBe('DISABLED');

    await agent.enable();
    await agent.enable();
    expect(await agent.currentStatus()).toBe('ENABLED');
  });

  it('updates local attributes only after the remote call succeeds', async () => {
    const agents = new AgentClient(new InMemoryAgentBackend());
    const agent = await agents.create({ name: 'A1', attributes: { profileName: 'P1', role: 'Analyst' }});

    await expect(agent.setAttribute('mood', 'happy')).rejects.toBeInstanceOf(ValidationError);
    expect(agent.attributes).toEqual({ profileName: 'P1', role: 'Analyst' });

    await agent.setAttribute('role', 'Reviewer');
    expect(agent.attributes).toEqual({ profileName: 'P1', role: 'Reviewer' });
  });

  it('keeps its own copy of the attributes it was created with', async () => {
    const backend = new InMemoryAgentBackend();
    const tasks = new TaskClient(backend);
    const attributes = { instruction: 'a', tools: [ 'T1' ]};

    const task = await tasks.create({ name: 'T1', attributes });
    attributes.tools.push('T2');
    attributes.instruction = '';

    expect(task.attributes).toEqual({ instruction: 'a', tools: [ 'T1' ]});
    expect((await tasks.fetch('T1')).attributes).toEqual({ instruction: 'a', tools: [ 'T1' ]});
  });

  it('keeps its own copy after a full attribute replace', async () => {
    const tasks = new TaskClient(new InMemoryAgentBackend());
    const task = await tasks.create({ name: 'T1', attributes: { instruction: 'a' }});
    const next = { instruction: 'b', tools: [ 'T1' ]};

    await task.setAttributes(next);
    next.tools.push('T2');

    expect(task.attributes).toEqual({ instruction: 'b', tools: [ 'T1' ]});
  });

  it('returns the changes of a full attribute replace', async () => {
    const agents = new AgentClient(new InMemoryAgentBackend());
    const agent = await agents.create({ name: 'A1', attributes: { profileName: 'P1', role: 'Analyst' }});

    const changes = await agent.setAttributes({ profileName: 'P2', role: 'Analyst', enableHumanTool: true });

    expect(changes).toEqual([
      { key: 'profileName', wire: 'profile_name', before: 'P1', after: 'P2' },
      { key: 'enableHumanTool', wire: 'enable_human_tool', before: undefined, after: true },
    ]);
    expect(agent.attributes.profileName).toBe('P2');
  });

  it('refreshes from the backend and serialises to a snapshot', async () => {
    const backend = new InMemoryAgentBackend();
    const agents = new AgentClient(backend);
    const agent = await agents.create({ name: 'A1', description: 'one', attributes: { profileName: 'P1', role: 'Analyst' }});
    await agents.setAttribute('A1', 'role', 'Planner');

    await agent.refresh();

    expect(JSON.parse(JSON.stringify(agent))).toEqual({
      name: 'A1',
      description: 'one',
      status: 'ENABLED',
      attributes: { profileName: 'P1', role: 'Planner' },
    });
  });

  it('clears the status on delete and rejects later refreshes', async () => {
    const agents = new AgentClient(new InMemoryAgentBackend());
    const agent = await agents.create({ name: 'A1', attributes: { profileName: 'P1', role: 'Analyst' }});

    await agent.delete({ force: true });

    expect(agent.status).toBeUndefined();
    await expect(agent.refresh()).rejects.toBeInstanceOf(AgentNotFoundError);
  });
});
