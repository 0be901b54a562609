import React, { useEffect, useMemo, useRef, useState } from 'react';
import { Box, Text, useApp, useInput, useStdout } from 'ink';
import { logger } from '../logger.js';
import type { EventBus } from '../events/index.js';
import { rankModels } from '../tournament/stats.js';
import type { GameLogEntry, Phase, Role, TournamentResult } from '../types.js';

type PovMode = 'ALL' | 'PUBLIC';
type ViewMode = 'LOG' | 'STANDINGS';

export interface AppProps {
  players: string[];
  plannedGames: number;
  // Ledger snapshots, one per committed game.
  standings?: EventBus<TournamentResult>;
}

const PHASES: readonly Phase[] = ['setup', 'clue', 'discussion', 'voting', 'resolution'];

function formatTime(iso: string): string {
  const t = iso.split('T')[1];
  if (!t) return iso;
  return t.split('.')[0] ?? t;
}

function typeColor(type: GameLogEntry['type']): string | undefined {
  switch (type) {
    case 'SYSTEM':
      return 'gray';
    case 'CLUE':
      return 'cyan';
    case 'VOTE':
      return 'blue';
    case 'ELIMINATION':
      return 'red';
    case 'WIN':
      return 'green';
    case 'THOUGHT':
      return 'gray';
    case 'CHAT':
    default:
      return undefined;
  }
}

function roleColor(role: Role | undefined): string | undefined {
  switch (role) {
    case 'impostor':
      return 'redBright';
    case 'citizen':
      return 'green';
    default:
      return undefined;
  }
}

function getMetadataRole(entry: GameLogEntry): Role | undefined {
  const v = entry.metadata?.role;
  return v === 'citizen' || v === 'impostor' ? v : undefined;
}

function getMetadataPhase(entry: GameLogEntry): Phase | undefined {
  const v = entry.metadata?.phase;
  return PHASES.find(p => p === v);
}

function entryToPlainText(entry: GameLogEntry): string {
  const role = getMetadataRole(entry);
  const time = formatTime(entry.timestamp);
  const prefix = entry.player
    ? `[${time}] [${entry.type}] <${entry.player}${role ? `:${role}` : ''}>: `
    : `[${time}] [${entry.type}]: `;
  return `${prefix}${entry.content}`;
}

function estimateWrappedLines(text: string, width: number): number {
  if (width <= 0) return 0;
  // Approximation by character width; only used to decide how many tail entries to render.
  let lines = 0;
  for (const p of text.split('\n')) {
    lines += Math.max(1, Math.ceil(p.length / width));
  }
  return lines;
}

const pct = (x: number) => `${(x * 100).toFixed(0)}%`.padStart(5);

export function App(props: AppProps) {
  const { exit } = useApp();
  const { stdout } = useStdout();
  const [dimensions, setDimensions] = useState(() => ({
    columns: stdout.columns ?? 80,
    rows: stdout.rows ?? 24,
  }));

  const [showThoughts, setShowThoughts] = useState(true);
  const [pov, setPov] = useState<PovMode>('ALL');
  const [view, setView] = useState<ViewMode>('LOG');
  const [entries, setEntries] = useState<GameLogEntry[]>(() => logger.getLogs());
  const [snapshot, setSnapshot] = useState<TournamentResult | null>(null);
  const [scrollFromBottomRows, setScrollFromBottomRows] = useState(0);
  const prevTotalRowsRef = useRef<number>(0);

  useEffect(() => {
    const onResize = () => {
      setDimensions({ columns: stdout.columns ?? 80, rows: stdout.rows ?? 24 });
    };
    stdout.on('resize', onResize);
    return () => {
      stdout.off('resize', onResize);
    };
  }, [stdout]);

  useEffect(() => {
    const unsub = logger.subscribe(e => {
      setEntries(prev => {
        const next = [...prev, e];
        // Keep bounded scrollback for performance.
        return next.length > 5000 ? next.slice(-5000) : next;
      });
    });
    return () => {
      unsub();
    };
  }, []);

  useEffect(() => {
    if (!props.standings) return;
    return props.standings.subscribe(s => setSnapshot(s));
  }, [props.standings]);

  // Where the run is: the last phase marker carries the game index and phase.
  const progress = useMemo(() => {
    for (let i = entries.length - 1; i >= 0; i--) {
      const e = entries[i]!;
      const meta = e.metadata;
      if (!meta || meta.kind !== 'phase') continue;
      const gameIndex = meta.gameIndex;
      return {
        game: typeof gameIndex === 'number' ? gameIndex + 1 : undefined,
        phase: getMetadataPhase(e),
      };
    }
    return { game: undefined, phase: undefined };
  }, [entries]);

  const finished = useMemo(() => entries.some(e => e.metadata?.kind === 'tournament_complete'), [entries]);

  useInput((input, key) => {
    if (input === 'q' || key.escape) {
      exit();
      return;
    }
    if (input === 's') {
      setView(v => (v === 'LOG' ? 'STANDINGS' : 'LOG'));
      return;
    }
    if (view === 'STANDINGS') return;

    if (key.upArrow) {
      setScrollFromBottomRows(v => v + 1);
      return;
    }
    if (key.downArrow) {
      setScrollFromBottomRows(v => Math.max(0, v - 1));
      return;
    }
    if (key.pageUp) {
      setScrollFromBottomRows(v => v + Math.max(1, Math.floor(logContentRows * 0.9)));
      return;
    }
    if (key.pageDown) {
      setScrollFromBottomRows(v => Math.max(0, v - Math.max(1, Math.floor(logContentRows * 0.9))));
      return;
    }
    if (input === 'G') {
      // Jump to oldest (top).
      setScrollFromBottomRows(Number.POSITIVE_INFINITY);
      return;
    }
    if (input === 'g') {
      // Jump to newest (bottom / follow).
      setScrollFromBottomRows(0);
      return;
    }
    if (input === 't') {
      setShowThoughts(v => !v);
      return;
    }
    if (input === 'p') {
      setPov(current => (current === 'ALL' ? 'PUBLIC' : 'ALL'));
    }
  });

  const visibleEntries = useMemo(() => {
    return entries.filter(e => {
      if (!showThoughts && e.type === 'THOUGHT') return false;
      if (pov === 'ALL') return true;
      // PUBLIC: what the players themselves could see.
      return e.type !== 'THOUGHT' && e.metadata?.visibility !== 'private';
    });
  }, [entries, pov, showThoughts]);

  // Keep the header pinned: only render the tail of the log that fits.
  const headerRows = 2;
  const logBoxHeight = Math.max(3, dimensions.rows - headerRows);
  const logContentRows = Math.max(1, logBoxHeight - 2); // border top/bottom
  const logContentWidth = Math.max(10, dimensions.columns - 2 /* border */ - 2 /* paddingX */);

  const metrics = useMemo(() => {
    return visibleEntries.map(e => ({
      entry: e,
      rows: estimateWrappedLines(entryToPlainText(e), logContentWidth),
    }));
  }, [visibleEntries, logContentWidth]);

  const totalRows = useMemo(() => metrics.reduce((acc, m) => acc + m.rows, 0), [metrics]);
  const maxScrollFromBottom = useMemo(() => Math.max(0, totalRows - logContentRows), [logContentRows, totalRows]);

  useEffect(() => {
    // Keep the viewport stable if new rows appear while the user is scrolled up.
    const prev = prevTotalRowsRef.current;
    if (prev !== 0 && totalRows > prev) {
      const delta = totalRows - prev;
      setScrollFromBottomRows(v => (v > 0 ? v + delta : 0));
    }
    prevTotalRowsRef.current = totalRows;
  }, [totalRows]);

  useEffect(() => {
    setScrollFromBottomRows(v => Math.min(maxScrollFromBottom, Number.isFinite(v) ? v : maxScrollFromBottom));
  }, [maxScrollFromBottom]);

  const clampedScrollFromBottom = Math.min(scrollFromBottomRows, maxScrollFromBottom);

  const lines = useMemo(() => {
    if (metrics.length === 0) return [];

    const endRowExclusive = Math.max(0, totalRows - clampedScrollFromBottom);
    const startRowInclusive = Math.max(0, endRowExclusive - logContentRows);

    const picked: GameLogEntry[] = [];
    let cursor = 0;
    for (const m of metrics) {
      const nextCursor = cursor + m.rows;
      if (nextCursor > startRowInclusive && cursor < endRowExclusive) picked.push(m.entry);
      cursor = nextCursor;
      if (cursor >= endRowExclusive) break;
    }

    if (picked.length === 0) return [metrics[metrics.length - 1]!.entry];
    return picked;
  }, [clampedScrollFromBottom, logContentRows, metrics, totalRows]);

  const rows = useMemo(() => (snapshot ? rankModels(snapshot.modelStats) : []), [snapshot]);
  const modelWidth = useMemo(() => Math.max(5, ...rows.map(r => r.model.length)), [rows]);

  const header = (
    <Box flexShrink={0}>
      <Text bold>Impostor Arena</Text>
      <Text>  </Text>
      <Text color="gray">Game:</Text>
      <Text> {progress.game ?? '-'}/{props.plannedGames}</Text>
      <Text>  </Text>
      <Text color="gray">Phase:</Text>
      <Text> {finished ? 'done' : (progress.phase ?? '-')}</Text>
      <Text>  </Text>
      <Text color="gray">Players:</Text>
      <Text> {props.players.length}</Text>
      {view === 'LOG' ? (
        <>
          <Text>  </Text>
          <Text color="gray">POV:</Text>
          <Text> {pov}</Text>
          <Text>  </Text>
          <Text color="gray">Thoughts:</Text>
          <Text> {showThoughts ? 'on' : 'off'}</Text>
        </>
      ) : null}
    </Box>
  );

  if (view === 'STANDINGS') {
    return (
      <Box flexDirection="column" width={dimensions.columns} height={dimensions.rows} overflow="hidden">
        {header}
        <Box>
          <Text color="gray">Keys:</Text>
          <Text> s switch to Log</Text>
          <Text color="gray"> | </Text>
          <Text>q/esc quit</Text>
        </Box>
        <Box borderStyle="round" flexDirection="column" paddingX={1} height={logBoxHeight} overflow="hidden">
          {snapshot ? (
            <>
              <Text>
                <Text color="green">Citizens {snapshot.sideWins.citizens}</Text>
                <Text color="gray"> | </Text>
                <Text color="redBright">Impostor {snapshot.sideWins.impostor}</Text>
                <Text color="gray">
                  {' '}
                  ({snapshot.games.length}/{snapshot.plannedGames} games)
                </Text>
              </Text>
              <Text color="gray">
                {'#  '}
                {'Model'.padEnd(modelWidth)}
                {'  Win%  W/G    Imp   Cit   Elim'}
              </Text>
              {rows.map((r, i) => (
                <Text key={r.model}>
                  {`${i + 1}.`.padEnd(3)}
                  {r.model.padEnd(modelWidth)}
                  {`  ${pct(r.winRate)} ${`${r.totalWins}/${r.gamesPlayed}`.padEnd(6)}`}
                  <Text color={roleColor('impostor')}>{`${r.winsAsImpostor}/${r.gamesAsImpostor}`.padEnd(6)}</Text>
                  <Text color={roleColor('citizen')}>{`${r.winsAsCitizen}/${r.gamesAsCitizen}`.padEnd(6)}</Text>
                  {String(r.eliminatedCount)}
                </Text>
              ))}
            </>
          ) : (
            <Text color="gray">No games completed yet</Text>
          )}
        </Box>
      </Box>
    );
  }

  return (
    <Box flexDirection="column" width={dimensions.columns} height={dimensions.rows} overflow="hidden">
      {header}
      <Box>
        <Text color="gray">Keys:</Text>
        <Text> </Text>
        <Text>s standings</Text>
        <Text color="gray"> | </Text>
        <Text>t toggle thoughts</Text>
        <Text color="gray"> | </Text>
        <Text>p toggle POV</Text>
        <Text color="gray"> | </Text>
        <Text>↑/↓ scroll</Text>
        <Text color="gray"> | </Text>
        <Text>G top / g bottom</Text>
        <Text color="gray"> | </Text>
        <Text>q/esc quit</Text>
      </Box>
      <Box
        borderStyle="round"
        flexDirection="column"
        paddingX={1}
        height={logBoxHeight}
        overflow="hidden"
        flexGrow={1}
      >
        {lines.map(e => {
          const role = getMetadataRole(e);
          return (
            <Text key={e.id} wrap="wrap">
              <Text color="gray">[{formatTime(e.timestamp)}]</Text> <Text color={typeColor(e.type)}>{`[${e.type}]`}</Text>
              {e.player ? (
                <>
                  <Text> </Text>
                  <Text color="yellow">{`<${e.player}`}</Text>
                  {role ? <Text color={roleColor(role)}>{`:${role}`}</Text> : null}
                  <Text color="yellow">&gt;</Text>
                </>
              ) : null}
              <Text>: </Text>
              <Text>{e.content}</Text>
            </Text>
          );
        })}
      </Box>
    </Box>
  );
}
