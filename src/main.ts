import readline from 'node:readline';
import { parseCommandLineArgs } from './config/cliConfig';
import { CONSOLE_EVENT_HISTORY } from './config';
import { createContextLogger, enableFileLogging, setLogLevel } from './utils/logger';
import { GameEngine, type GameMode } from './engine/core/GameEngine';
import { GameLoop } from './engine/core/GameLoop';
import { type IdentityComponent, type PrimaryAttribute, PRIMARY_ATTRIBUTES } from './engine/components';
import type { Direction } from './engine/systems/ExplorationSystem';
import { BattleLog } from './ui/BattleLog';
import { MAP_LEGEND, formatActions, formatBattleView, formatPlayerView, renderZone } from './ui/ConsoleView';

const logger = createContextLogger('Console');

const MOVE_KEYS: Record<string, Direction> = { w: 'up', a: 'left', s: 'down', d: 'right' };

const HELP = [
  'w/a/s/d          move',
  'map              show the current zone',
  'actions          list battle actions',
  'use <n|name>     use a battle action',
  'status           show your character',
  'spend <attr>     spend a point on intelligence, health, special or abilities',
  'retry            fight the last enemy again',
  'hub              give up and return to the hub',
  'quit             leave the game',
];

function isPrimaryAttribute(value: string): value is PrimaryAttribute {
  return PRIMARY_ATTRIBUTES.some((attr) => attr === value);
}

function main(): void {
  const config = parseCommandLineArgs();
  setLogLevel(config.logLevel);
  if (config.logToFile) {
    enableFileLogging(config.logDir);
  }
  logger.info(`Starting with seed ${config.seed}`);

  const engine = new GameEngine({ seed: config.seed, maxEventHistory: CONSOLE_EVENT_HISTORY });
  engine.newGame({ name: config.playerName });

  const print = (line: string): void => {
    process.stdout.write(`${line}\n`);
  };
  const printAll = (lines: string[]): void => lines.forEach(print);

  const battleLog = new BattleLog(
    print,
    (id) => engine.getWorld().getComponent<IdentityComponent>(id, 'identity')?.name
  );
  battleLog.subscribeToEvents((type, fn) => engine.subscribeToEvent(type, fn));
  engine.subscribeToAllEvents((event) => {
    logger.debug(`${event.type} turn ${event.turn} ${JSON.stringify(event.data)}`);
  });

  const showMap = (): void => {
    printAll(renderZone(engine.getZoneView()));
    print(MAP_LEGEND);
  };

  const showBattle = (): void => {
    const view = engine.getBattleView();
    if (!view) return;
    printAll(formatBattleView(view));
    if (view.phase === 'awaitingPlayerInput') {
      printAll(formatActions(view));
    }
  };

  let lastMode: GameMode = engine.getMode();

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout, prompt: '> ' });
  let closed = false;
  const prompt = (): void => {
    if (!closed) rl.prompt();
  };

  const loop = new GameLoop(engine, config, () => {
    const messages = engine.drainMessages();
    printAll(messages);

    const mode = engine.getMode();
    if (mode === lastMode) {
      if (messages.length > 0) prompt();
      return;
    }
    lastMode = mode;
    switch (mode) {
      case 'battle':
        showBattle();
        break;
      case 'defeated':
        print(engine.canReturnToHub() ? 'Type "retry" to fight again or "hub" to retreat.' : 'Type "retry" to fight again.');
        break;
      case 'exploring':
        showMap();
        break;
      case 'victory':
        print('Congratulations! You defeated Marduk and saved the world!');
        loop.stop();
        rl.close();
        return;
    }
    prompt();
  });
  loop.on('error', (error: Error) => {
    print(`Error: ${error.message}`);
  });

  const handleCommand = (input: string): void => {
    const [command = '', ...rest] = input.trim().split(/\s+/);
    const argument = rest.join(' ');
    const direction = MOVE_KEYS[command.toLowerCase()];

    if (direction) {
      const outcome = engine.move(direction);
      if (outcome.kind === 'blocked') {
        print(`You cannot go that way (${outcome.reason}).`);
      } else if (engine.getMode() === 'exploring') {
        showMap();
      }
      return;
    }

    switch (command.toLowerCase()) {
      case '':
        return;
      case 'help':
        printAll(HELP);
        return;
      case 'map':
        showMap();
        return;
      case 'actions':
        showBattle();
        return;
      case 'use': {
        const index = Number(argument);
        const actions = engine.getAvailableActions();
        const name = Number.isInteger(index) && index >= 1 && index <= actions.length
          ? actions[index - 1].action.name
          : argument;
        const result = engine.submitPlayerAction(name);
        if (!result.accepted) {
          print(`Cannot use ${name}: ${result.reasons.join('; ')}`);
        } else if (!result.report) {
          showBattle();
        }
        return;
      }
      case 'status':
        printAll(formatPlayerView(engine.getPlayerView()));
        showBattle();
        return;
      case 'spend': {
        const attr = argument.toLowerCase();
        if (!isPrimaryAttribute(attr)) {
          print(`Unknown attribute "${argument}". Choose from ${PRIMARY_ATTRIBUTES.join(', ')}.`);
          return;
        }
        print(engine.spendAttributePoint(attr) ? `${attr} increased.` : 'No attribute points to spend.');
        return;
      }
      case 'retry':
        engine.retryBattle();
        return;
      case 'hub':
        engine.returnToHub();
        return;
      case 'quit':
        rl.close();
        return;
      default:
        print(`Unknown command "${command}". Type "help" for a list.`);
    }
  };

  rl.on('line', (line) => {
    void loop.runExclusive('input', () => handleCommand(line)).then(prompt);
  });
  rl.on('close', () => {
    closed = true;
    loop.stop();
    logger.info('Goodbye');
  });

  print(`Welcome, ${config.playerName}. Type "help" for commands.`);
  showMap();
  loop.start();
  prompt();
}

main();
