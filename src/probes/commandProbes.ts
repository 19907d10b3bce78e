import { execFile } from 'child_process';
import { ActiveWindowProbe, IdleProbe, ProbeResult, known, unavailable } from '../types';
import { toError } from '../types/errors';
import { logger } from '../utils/logger';

/**
 * 外部コマンドを実行して標準出力を返す（テストでは差し替える）
 */
export type CommandRunner = (file: string, args: readonly string[], timeoutMs: number) => Promise<string>;

const COMMAND_TIMEOUT_MS = 3000;

export const execFileRunner: CommandRunner = (file, args, timeoutMs) =>
    new Promise((resolve, reject) => {
        execFile(file, [...args], { timeout: timeoutMs, windowsHide: true }, (error, stdout) => {
            if (error) {
                reject(error);
            } else {
                resolve(String(stdout));
            }
        });
    });

// PowerShell: 前面ウィンドウのプロセス名とタイトル
const WINDOWS_ACTIVE_WINDOW_SCRIPT = `
Add-Type @"
using System;
using System.Runtime.InteropServices;
using System.Text;
public class ForegroundWindow {
    [DllImport("user32.dll")] public static extern IntPtr GetForegroundWindow();
    [DllImport("user32.dll")] public static extern int GetWindowText(IntPtr hWnd, StringBuilder text, int count);
    [DllImport("user32.dll")] public static extern uint GetWindowThreadProcessId(IntPtr hWnd, out uint processId);
}
"@
$hwnd = [ForegroundWindow]::GetForegroundWindow()
$title = New-Object System.Text.StringBuilder 512
[void][ForegroundWindow]::GetWindowText($hwnd, $title, 512)
$processId = 0
[void][ForegroundWindow]::GetWindowThreadProcessId($hwnd, [ref]$processId)
$name = (Get-Process -Id $processId).ProcessName
Write-Output "$name - $($title.ToString())"
`;

// PowerShell: 最後の入力からの経過ミリ秒
const WINDOWS_IDLE_SCRIPT = `
Add-Type @"
using System;
using System.Runtime.InteropServices;
public class LastInput {
    [StructLayout(LayoutKind.Sequential)] public struct LASTINPUTINFO { public uint cbSize; public uint dwTime; }
    [DllImport("user32.dll")] public static extern bool GetLastInputInfo(ref LASTINPUTINFO info);
    public static uint IdleMillis() {
        LASTINPUTINFO info = new LASTINPUTINFO();
        info.cbSize = (uint)Marshal.SizeOf(info);
        GetLastInputInfo(ref info);
        return (uint)Environment.TickCount - info.dwTime;
    }
}
"@
Write-Output ([LastInput]::IdleMillis())
`;

const MAC_FRONTMOST_SCRIPT = 'tell application "System Events" to get name of first application process whose frontmost is true';

export function parseMillis(stdout: string): number | null {
    const value = Number(stdout.trim());
    if (stdout.trim() === '' || !Number.isFinite(value) || value < 0) {
        return null;
    }
    return value / 1000;
}

/**
 * ioreg の HIDIdleTime（ナノ秒）を秒に変換
 */
export function parseIoregIdle(stdout: string): number | null {
    const match = /"HIDIdleTime"\s*=\s*(\d+)/.exec(stdout);
    if (!match) {
        return null;
    }
    return Number(match[1]) / 1e9;
}

interface PlatformCommands {
    activeWindow: { file: string; args: string[] };
    idle: { file: string; args: string[]; parse: (stdout: string) => number | null };
}

function powershell(script: string): { file: string; args: string[] } {
    return { file: 'powershell', args: ['-NoProfile', '-NonInteractive', '-Command', script] };
}

export function commandsFor(platform: NodeJS.Platform): PlatformCommands | null {
    switch (platform) {
        case 'win32':
            return {
                activeWindow: powershell(WINDOWS_ACTIVE_WINDOW_SCRIPT),
                idle: { ...powershell(WINDOWS_IDLE_SCRIPT), parse: parseMillis }
            };
        case 'darwin':
            return {
                activeWindow: { file: 'osascript', args: ['-e', MAC_FRONTMOST_SCRIPT] },
                idle: { file: 'ioreg', args: ['-c', 'IOHIDSystem'], parse: parseIoregIdle }
            };
        case 'linux':
            return {
                activeWindow: { file: 'xdotool', args: ['getactivewindow', 'getwindowname'] },
                idle: { file: 'xprintidle', args: [], parse: parseMillis }
            };
        default:
            return null;
    }
}

/**
 * OS標準のツールを呼び出すプローブ。失敗は例外ではなく unavailable を返す
 */
export class CommandProbe implements ActiveWindowProbe, IdleProbe {
    private readonly commands: PlatformCommands | null;

    constructor(
        private readonly runner: CommandRunner = execFileRunner,
        platform: NodeJS.Platform = process.platform,
        private readonly timeoutMs: number = COMMAND_TIMEOUT_MS
    ) {
        this.commands = commandsFor(platform);
        if (!this.commands) {
            logger.warn(`未対応のプラットフォームです: ${platform}`);
        }
    }

    async probeActiveWindow(): Promise<ProbeResult<string>> {
        if (!this.commands) {
            return unavailable('unsupported platform');
        }
        const { file, args } = this.commands.activeWindow;
        try {
            const title = (await this.runner(file, args, this.timeoutMs)).trim();
            return title ? known(title) : unavailable(`${file} returned no window`);
        } catch (error) {
            return unavailable(`${file} failed: ${toError(error).message}`);
        }
    }

    async probeIdleSeconds(): Promise<ProbeResult<number>> {
        if (!this.commands) {
            return unavailable('unsupported platform');
        }
        const { file, args, parse } = this.commands.idle;
        try {
            const seconds = parse(await this.runner(file, args, this.timeoutMs));
            return seconds === null ? unavailable(`${file} returned unexpected output`) : known(seconds);
        } catch (error) {
            return unavailable(`${file} failed: ${toError(error).message}`);
        }
    }
}
