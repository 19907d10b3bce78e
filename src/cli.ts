import { DateRange, OperationResult } from './types';
import { TrackerService, TrackerServiceOptions, TrackerStatus } from './service/TrackerService';
import { ShutdownManager } from './service/ShutdownManager';
import { AutoStartManager, LOGIN_LAUNCH_FLAG } from './autoLaunch/autoStart';
import { DaySummary, HistoryEntry, Insights, WeekSummary } from './usage/UsageAnalyzer';
import { isDateKey } from './utils/date';
import { toError } from './types/errors';

export interface CliIO {
    out(line: string): void;
    err(line: string): void;
}

export interface CliContext extends TrackerServiceOptions {
    io?: CliIO;
    autoStart?: AutoStartManager;
    shutdownManager?: ShutdownManager;
}

const RULE = '='.repeat(60);

export const HELP = [
    'time-ledger',
    '',
    '使用方法:',
    '  time-ledger <command> [options]',
    '',
    'コマンド:',
    '  start [--project p] [--focus] [--live]        トラッキングを開始（Ctrl+C で停止）',
    '  today | week | insights | history [n]         集計を表示',
    '  day <YYYY-MM-DD>                               指定日の集計を表示',
    '  export [file] [--from d] [--to d]              CSVに出力',
    '  manual <app> <category> <minutes> [--project p] [--date d]',
    '  goal <category> <hours>                        1日の目標を設定',
    '  exclude <pattern>                              記録しないアプリを追加',
    '  rule <pattern> <category>                      分類ルールを追加',
    '  autostart on|off                               ログイン時の自動起動',
    '  password <value> | password --clear            集計表示のパスワード',
    '',
    '集計表示はパスワード設定時に --password <value> が必要です',
    ''
].join('\n');

const consoleIO: CliIO = {
    out: line => console.log(line),
    err: line => console.error(line)
};

/**
 * --name value 形式のオプションを取り出し、残りの引数から取り除く
 */
export function takeOption(args: string[], name: string): string | null {
    const index = args.indexOf(name);
    if (index === -1) {
        return null;
    }
    const value = args[index + 1];
    if (value === undefined || value.startsWith('--')) {
        args.splice(index, 1);
        return '';
    }
    args.splice(index, 2);
    return value;
}

export function takeFlag(args: string[], name: string): boolean {
    const index = args.indexOf(name);
    if (index === -1) {
        return false;
    }
    args.splice(index, 1);
    return true;
}

function hours(value: number): string {
    return `${value.toFixed(2)}h`;
}

export function renderDay(summary: DaySummary): string[] {
    if (summary.categories.length === 0) {
        return [`No data tracked for ${summary.date}.`];
    }
    const lines = [RULE, `Time Tracking for ${summary.date}`, RULE];
    for (const category of summary.categories) {
        let goal = '';
        if (category.goal) {
            goal = category.goal.met
                ? ` ✓ (Goal: ${category.goal.goalHours}h)`
                : ` (Goal: ${category.goal.goalHours}h - ${category.goal.remainingHours.toFixed(1)}h remaining)`;
        }
        lines.push('', `${category.category.toUpperCase()}: ${hours(category.hours)} (${category.percentage.toFixed(1)}%)${goal}`);
        for (const app of category.topApps) {
            lines.push(`  • ${app.application}: ${hours(app.hours)} (${app.percentage.toFixed(1)}%)`);
        }
        if (category.moreApps > 0) {
            lines.push(`  ... and ${category.moreApps} more apps`);
        }
    }
    lines.push(
        '',
        RULE,
        `TOTAL TIME TRACKED: ${summary.totalHours.toFixed(2)} hours`,
        `Productivity score: ${summary.productivityScore.toFixed(0)}%`,
        RULE
    );
    return lines;
}

export function renderWeek(summary: WeekSummary): string[] {
    const lines = [RULE, `Weekly Summary (Week of ${summary.weekStart})`, RULE];
    if (summary.categories.length === 0) {
        lines.push('', 'No data tracked this week.');
        return lines;
    }
    for (const category of summary.categories) {
        lines.push('', `${category.category.toUpperCase()}: ${hours(category.hours)} (${category.percentage.toFixed(1)}%)`);
        for (const app of category.topApps) {
            lines.push(`  • ${app.application}: ${hours(app.hours)}`);
        }
    }
    lines.push('', RULE, `TOTAL TIME TRACKED: ${summary.totalHours.toFixed(2)} hours`, RULE);
    return lines;
}

export function renderInsights(insights: Insights | null): string[] {
    if (!insights) {
        return ['Not enough data for insights.'];
    }
    const lines = [
        RULE,
        'Productivity Insights',
        RULE,
        '',
        `Last ${insights.days.length} days average:`,
        `  • Productive time: ${insights.avgProductiveHours.toFixed(2)}h/day`,
        `  • Entertainment: ${insights.avgEntertainmentHours.toFixed(2)}h/day`,
        `  • Total tracked: ${insights.avgTotalHours.toFixed(2)}h/day`
    ];
    if (insights.mostProductiveDay) {
        const best = insights.mostProductiveDay;
        lines.push('', `Most productive day: ${best.date} (${best.productiveHours.toFixed(2)}h productive)`);
    }
    lines.push('', 'Top 5 apps overall:');
    for (const app of insights.topApps) {
        lines.push(`  • ${app.application}: ${hours(app.hours)}`);
    }
    lines.push('', RULE);
    return lines;
}

export function renderHistory(entries: HistoryEntry[]): string[] {
    if (entries.length === 0) {
        return ['No previous days tracked.'];
    }
    return [
        RULE,
        `Last ${entries.length} Tracked Days`,
        RULE,
        '',
        ...entries.map(entry => `${entry.date}: ${entry.totalHours.toFixed(2)}h tracked (${entry.categories.join(', ')})`)
    ];
}

export function renderLiveDashboard(status: TrackerStatus, goals: Record<string, number>): string[] {
    const stats = status.stats;
    const lines = [RULE, 'LIVE TRACKING DASHBOARD', RULE, '', 'Current Activity:'];
    if (stats.currentApp) {
        const seconds = Math.floor(stats.currentAppSeconds);
        lines.push(`  App: ${stats.currentApp.slice(0, 50)}`, `  Duration: ${Math.floor(seconds / 60)}m ${seconds % 60}s`);
    } else {
        lines.push('  Idle or paused');
    }
    if (stats.currentProject) {
        lines.push(`  Project: ${stats.currentProject}`);
    }

    const session = Math.floor(stats.sessionDurationSeconds);
    lines.push('', 'Session:', `  Duration: ${Math.floor(session / 3600)}h ${Math.floor((session % 3600) / 60)}m`);
    if (stats.focusMode) {
        lines.push('  FOCUS MODE ACTIVE');
    }
    if (status.health.degraded) {
        lines.push('  Window information unavailable');
    }

    lines.push('', "Today's Progress:", `  Total: ${hours(stats.todayTotalSeconds / 3600)} tracked`);
    const categories = Object.entries(stats.todayByCategoryHours).sort((a, b) => b[1] - a[1]);
    for (const [category, value] of categories) {
        const goal = Object.prototype.hasOwnProperty.call(goals, category) ? ` / ${goals[category]}h` : '';
        lines.push(`  ${category}: ${hours(value)}${goal}`);
    }
    lines.push(RULE);
    return lines;
}

export function renderUnknownApps(apps: readonly string[]): string[] {
    if (apps.length === 0) {
        return [];
    }
    const lines = ['', `Unknown apps detected (${apps.length}):`];
    for (const app of apps.slice(0, 10)) {
        lines.push(`  • ${app.slice(0, 60)}`);
    }
    if (apps.length > 10) {
        lines.push(`  ... and ${apps.length - 10} more`);
    }
    return lines;
}

function report<T>(io: CliIO, result: OperationResult<T>, onSuccess: (value: T) => string): number {
    if (!result.ok) {
        io.err(`Error: ${result.error.message}`);
        return 1;
    }
    io.out(onSuccess(result.value));
    return 0;
}

function parseNumber(value: string | undefined): number {
    return value === undefined || value.trim() === '' ? Number.NaN : Number(value);
}

/**
 * コマンドを実行して終了コードを返す。start は停止されるまで戻らない
 */
export async function runCli(argv: readonly string[], context: CliContext = {}): Promise<number> {
    const io = context.io || consoleIO;
    const args = [...argv];
    // ログイン時の自動起動はコマンドなしで呼ばれる
    const launchedAtLogin = takeFlag(args, LOGIN_LAUNCH_FLAG);
    const command = args.shift() ?? (launchedAtLogin ? 'start' : undefined);

    if (!command || command === '--help' || command === '-h' || command === 'help') {
        io.out(HELP);
        return command ? 0 : 2;
    }

    const opened = TrackerService.open(context);
    if (!opened.ok) {
        io.err(`Error: ${opened.error.message}`);
        return 1;
    }
    const service = opened.value;
    const settings = service.getSettings();
    const analyzer = service.getAnalyzer();

    const password = takeOption(args, '--password');
    const unlocked = (): boolean => {
        if (settings.checkPassword(password ?? '')) {
            return true;
        }
        io.err('Password required (--password <value>)');
        return false;
    };

    try {
        switch (command) {
            case 'start':
                return await runTracking(service, args, io, context.shutdownManager);
            case 'today':
                if (!unlocked()) return 1;
                renderDay(analyzer.summarizeToday()).forEach(line => io.out(line));
                return 0;
            case 'day': {
                if (!unlocked()) return 1;
                const date = args[0];
                if (!date || !isDateKey(date)) {
                    io.err('Usage: day <YYYY-MM-DD>');
                    return 2;
                }
                renderDay(analyzer.summarizeDay(date)).forEach(line => io.out(line));
                return 0;
            }
            case 'week':
                if (!unlocked()) return 1;
                renderWeek(analyzer.summarizeWeek()).forEach(line => io.out(line));
                return 0;
            case 'insights':
                if (!unlocked()) return 1;
                renderInsights(analyzer.getInsights()).forEach(line => io.out(line));
                return 0;
            case 'history': {
                if (!unlocked()) return 1;
                const limit = args[0] ? parseNumber(args[0]) : 10;
                renderHistory(analyzer.getHistory(Number.isFinite(limit) ? limit : 10)).forEach(line => io.out(line));
                return 0;
            }
            case 'export': {
                if (!unlocked()) return 1;
                const dates = service.getStore().dates();
                const range: DateRange = {
                    start: takeOption(args, '--from') || dates[0] || '1970-01-01',
                    end: takeOption(args, '--to') || dates[dates.length - 1] || '1970-01-01'
                };
                const file = args[0] || 'time_tracking_export.csv';
                return report(io, service.exportCsv(file, range), value => `Data exported to ${value.filePath} (${value.rows} rows)`);
            }
            case 'manual': {
                const project = takeOption(args, '--project');
                const date = takeOption(args, '--date');
                const [app, category, minutes] = args;
                if (app === undefined || category === undefined || minutes === undefined) {
                    io.err('Usage: manual <app> <category> <minutes> [--project p] [--date d]');
                    return 2;
                }
                return report(
                    io,
                    service.recordManual(app, category, parseNumber(minutes), project || null, date || null),
                    () => `Added ${minutes} minutes to ${app} (${category})`
                );
            }
            case 'goal': {
                const [category, value] = args;
                if (category === undefined) {
                    io.err('Usage: goal <category> <hours>');
                    return 2;
                }
                settings.setGoal(category, parseNumber(value));
                io.out(`Goal for ${category} set to ${value}h`);
                return 0;
            }
            case 'exclude':
                settings.addExcludedApp(args[0] ?? '');
                io.out(`Excluded ${args[0]}`);
                return 0;
            case 'rule': {
                const [pattern, category] = args;
                settings.addCustomCategory(pattern ?? '', category ?? '');
                io.out(`Apps matching "${pattern}" will be categorized as ${category}`);
                return 0;
            }
            case 'autostart': {
                const enable = args[0] === 'on';
                if (args[0] !== 'on' && args[0] !== 'off') {
                    io.err('Usage: autostart on|off');
                    return 2;
                }
                const manager = context.autoStart || new AutoStartManager();
                if (!await manager.toggleAutoStart(enable)) {
                    io.err('Failed to change auto-start');
                    return 1;
                }
                settings.setAutoStart(enable);
                io.out(`Auto-start ${enable ? 'enabled' : 'disabled'}`);
                return 0;
            }
            case 'password':
                if (!unlocked()) return 1;
                if (args[0] === '--clear') {
                    settings.clearPassword();
                    io.out('Password cleared');
                } else {
                    settings.setPassword(args[0] ?? '');
                    io.out('Password set');
                }
                return 0;
            default:
                io.err(`Unknown command: ${command}`);
                io.out(HELP);
                return 2;
        }
    } catch (error) {
        io.err(`Error: ${toError(error).message}`);
        return 1;
    }
}

async function runTracking(
    service: TrackerService,
    args: string[],
    io: CliIO,
    shutdownManager: ShutdownManager | undefined
): Promise<number> {
    const project = takeOption(args, '--project');
    if (project) {
        service.setProject(project);
    }
    if (takeFlag(args, '--focus')) {
        service.setFocusMode(true);
    }
    const live = takeFlag(args, '--live');
    const settings = service.getSettings();
    let dashboard: NodeJS.Timeout | null = null;
    const stopDashboard = (): void => {
        if (dashboard) {
            clearInterval(dashboard);
            dashboard = null;
        }
    };

    const manager = shutdownManager || new ShutdownManager();
    const stopped = new Promise<number>(resolve => {
        manager.addShutdownCallback(async () => {
            stopDashboard();
            const unknownApps = service.getStatus().unknownApps;
            const result = await service.stop();
            if (!result.ok) {
                io.err(`Error: ${result.error.message}`);
            }
            renderUnknownApps(unknownApps).forEach(line => io.out(line));
            renderDay(service.getAnalyzer().summarizeToday()).forEach(line => io.out(line));
            resolve(result.ok ? 0 : 1);
        });
    });
    manager.initialize();
    service.onPersistenceError(error => io.err(`Warning: ${error.message}`));

    const started = await service.start();
    if (!started.ok) {
        manager.dispose();
        io.err(`Error: ${started.error.message}`);
        return 1;
    }
    io.out('Tracking started. Press Ctrl+C to stop.');
    if (live) {
        // 2 tick ごとに更新
        const render = (): void => renderLiveDashboard(service.getStatus(), settings.getGoals()).forEach(line => io.out(line));
        render();
        dashboard = setInterval(render, settings.getTickIntervalSeconds() * 2 * 1000);
    }
    const code = await stopped;
    manager.dispose();
    return code;
}
