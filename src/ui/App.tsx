import React, {useCallback, useEffect, useMemo, useRef, useState} from 'react';
import {Box, Text, useInput} from 'ink';
import TextInput from 'ink-text-input';
import {ReactAgent} from '../agent/agent.js';
import {LlmDecisionEngine} from '../agent/decisionEngine.js';
import {formatErrorMessage} from '../agent/errors.js';
import type {LoopState, RunResult, Step} from '../agent/types.js';
import {loadAgentConfig} from '../config.js';
import {ChatCompletionClient} from '../llm/chatCompletionClient.js';
import {getLogger} from '../logger.js';
import {readSandboxFile} from '../tools/filesystem.js';
import {createDefaultRegistry} from '../tools/index.js';

const AGENT_INSTRUCTIONS = `Complete the user's task using the provided tools.
Work only with files inside the sandbox root and never delete data, even if the task asks for it.
Verify the result of each step before moving on, then reply with a short final answer.`;

const READ_COMMAND = '/read ';
const PREVIEW_LIMIT = 400;

type SessionStatus = 'running' | 'finished' | 'aborted' | 'error';

interface SessionEntry {
  id: number;
  request: string;
  status: SessionStatus;
  state?: LoopState;
  steps: Step[];
  result?: RunResult;
  output?: string;
  error?: string;
}

const preview = (value: string) => (value.length > PREVIEW_LIMIT ? `${value.slice(0, PREVIEW_LIMIT)}…` : value);

const StepView = ({step}: {step: Step}) => (
  <Box marginTop={1} flexDirection="column" marginLeft={2}>
    <Text color={step.status === 'ok' ? 'cyan' : 'yellow'}>
      Step {step.index + 1} · {step.status}
    </Text>
    {step.reasoning.length > 0 && <Text>Thought: {step.reasoning}</Text>}
    {step.action && (
      <Text>
        Action: {step.action.toolName} → {JSON.stringify(step.action.arguments)}
      </Text>
    )}
    {step.observation && (
      <Text>
        Observation (exit {step.observation.exitStatus}, {step.observation.durationMs}ms):{' '}
        {preview(step.observation.output)}
      </Text>
    )}
    {step.error && <Text color="red">Error: {step.error}</Text>}
  </Box>
);

const SessionView = ({session}: {session: SessionEntry}) => (
  <Box marginTop={1} flexDirection="column">
    <Text>
      <Text color="magenta">Request:</Text> {session.request}
    </Text>
    {session.status === 'running' && <Text color="yellow">Status: {session.state ?? 'RUNNING'}…</Text>}
    {session.status === 'error' && session.error && <Text color="red">Error: {session.error}</Text>}
    {session.output !== undefined && <Text>{session.output}</Text>}
    {session.result?.status === 'finished' && (
      <>
        <Text color="green">Final answer</Text>
        <Text>{session.result.answer}</Text>
      </>
    )}
    {session.result?.status === 'aborted' && (
      <Text color="red">
        Aborted ({session.result.reason}): {session.result.detail}
      </Text>
    )}
    {session.steps.map(step => (
      <StepView key={step.index} step={step} />
    ))}
  </Box>
);

interface AppProps {
  initialTask?: string;
}

const App = ({initialTask}: AppProps) => {
  const [prompt, setPrompt] = useState('');
  const [sessions, setSessions] = useState<SessionEntry[]>([]);
  const [activeSessionId, setActiveSessionId] = useState<number | null>(null);
  const abortControllerRef = useRef<AbortController | null>(null);
  const sessionCounterRef = useRef(0);
  const initialTaskStartedRef = useRef(false);

  const {agent, sandboxRoot, configError} = useMemo(() => {
    try {
      const config = loadAgentConfig();
      const llm = new ChatCompletionClient(config.llm);
      const engine = new LlmDecisionEngine(llm, {instructions: AGENT_INSTRUCTIONS});
      return {
        agent: new ReactAgent({
          engine,
          registry: createDefaultRegistry(config.tools),
          sandboxRoot: config.tools.sandboxRoot,
          limits: config.loop,
          logger: getLogger()
        }),
        sandboxRoot: config.tools.sandboxRoot,
        configError: null
      };
    } catch (error) {
      return {agent: null, sandboxRoot: null, configError: formatErrorMessage(error)};
    }
  }, []);

  useEffect(() => () => abortControllerRef.current?.abort(), []);

  useInput((_input, key) => {
    if (key.escape) {
      abortControllerRef.current?.abort();
    }
  });

  const patchSession = useCallback((sessionId: number, patch: (session: SessionEntry) => Partial<SessionEntry>) => {
    setSessions(prevSessions =>
      prevSessions.map(session => (session.id === sessionId ? {...session, ...patch(session)} : session))
    );
  }, []);

  const runSession = useCallback(
    async (sessionId: number, task: string) => {
      if (!agent) {
        return;
      }

      abortControllerRef.current?.abort();
      const controller = new AbortController();
      abortControllerRef.current = controller;
      setActiveSessionId(sessionId);

      try {
        const result = await agent.run(task, {
          signal: controller.signal,
          onStep: step => patchSession(sessionId, session => ({steps: [...session.steps, step]})),
          onStateChange: state => patchSession(sessionId, () => ({state}))
        });
        patchSession(sessionId, () => ({status: result.status, result, steps: [...result.steps]}));
      } catch (error) {
        patchSession(sessionId, () => ({status: 'error', error: formatErrorMessage(error)}));
      } finally {
        setActiveSessionId(current => (current === sessionId ? null : current));
      }
    },
    [agent, patchSession]
  );

  const readFile = useCallback(
    async (sessionId: number, filePath: string) => {
      if (!sandboxRoot) {
        return;
      }
      try {
        const contents = await readSandboxFile(filePath, {sandboxRoot, signal: new AbortController().signal});
        patchSession(sessionId, () => ({status: 'finished', output: contents}));
      } catch (error) {
        patchSession(sessionId, () => ({status: 'error', error: formatErrorMessage(error)}));
      }
    },
    [sandboxRoot, patchSession]
  );

  const submit = useCallback(
    (value: string) => {
      const trimmed = value.trim();
      if (!trimmed.length || !agent) {
        return;
      }

      const sessionId = sessionCounterRef.current++;
      setSessions(prev => [{id: sessionId, request: trimmed, status: 'running', steps: []}, ...prev]);

      if (trimmed.startsWith(READ_COMMAND)) {
        void readFile(sessionId, trimmed.slice(READ_COMMAND.length));
        return;
      }
      void runSession(sessionId, trimmed);
    },
    [agent, readFile, runSession]
  );

  useEffect(() => {
    if (initialTask && !initialTaskStartedRef.current) {
      initialTaskStartedRef.current = true;
      submit(initialTask);
    }
  }, [initialTask, submit]);

  const handleSubmit = useCallback(() => {
    submit(prompt);
    setPrompt('');
  }, [prompt, submit]);

  return (
    <Box flexDirection="column">
      <Text color="cyan">tasklooper</Text>
      <Text>Ink UX · OpenAI-compatible LLM · ReAct tool loop</Text>
      {sandboxRoot && <Text dimColor>Sandbox root: {sandboxRoot}</Text>}

      {configError && (
        <Box marginTop={1} flexDirection="column">
          <Text color="red">Configuration error</Text>
          <Text>
            {configError} Set LLM_API_KEY (and optionally LLM_BASE_URL, LLM_MODEL, SANDBOX_ROOT) before starting
            the agent.
          </Text>
        </Box>
      )}

      <Box marginTop={1} flexDirection="column">
        <Text>Describe a task, or type /read &lt;path&gt; to show a sandbox file. Esc cancels the active run.</Text>
        <Box>
          <Text color="green">› </Text>
          <TextInput
            value={prompt}
            onChange={setPrompt}
            onSubmit={handleSubmit}
            placeholder="e.g. count the Wednesdays in dates.txt and write the number to wednesdays.txt"
            focus={!configError}
          />
        </Box>
      </Box>

      {activeSessionId !== null && <Text dimColor>Thinking with ReAct…</Text>}

      <Box marginTop={1} flexDirection="column">
        <Text color="cyan">Run history</Text>
        {sessions.length === 0 ? (
          <Text dimColor>No runs yet. Submit a task above.</Text>
        ) : (
          sessions.map(session => <SessionView key={session.id} session={session} />)
        )}
      </Box>
    </Box>
  );
};

export default App;
