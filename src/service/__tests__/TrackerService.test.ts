import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { TrackerService } from '../TrackerService';
import { TrackingState } from '../../usage/TrackingLoop';
import { CorruptDocumentError, ValidationError } from '../../types/errors';
import { known } from '../../types';

jest.mock('../../utils/logger');

describe('TrackerService', () => {
    let dataDir: string;
    let now: number;
    let notifier: { notify: jest.Mock };

    const base = new Date(2024, 0, 15, 10, 0, 0).getTime();

    function open(): TrackerService {
        const result = TrackerService.open({
            dataDir,
            clock: () => new Date(now),
            notifier,
            activeWindowProbe: { probeActiveWindow: async () => known('Visual Studio Code') },
            idleProbe: { probeIdleSeconds: async () => known(0) }
        });
        if (!result.ok) {
            throw result.error;
        }
        return result.value;
    }

    beforeEach(() => {
        jest.useFakeTimers();
        dataDir = fs.mkdtempSync(path.join(os.tmpdir(), 'service-'));
        now = base;
        notifier = { notify: jest.fn() };
    });

    afterEach(() => {
        jest.useRealTimers();
        fs.removeSync(dataDir);
    });

    test('壊れた記録ファイルがあれば open は失敗を返すこと', () => {
        fs.writeFileSync(path.join(dataDir, 'time_tracking.json'), '{');

        const result = TrackerService.open({ dataDir });

        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.error).toBeInstanceOf(CorruptDocumentError);
        }
    });

    describe('recordManual', () => {
        test('記録してスナップショットに反映し、プロジェクトを登録すること', () => {
            const service = open();

            expect(service.recordManual('Notes', 'Writing', 30, 'book', '2024-01-01')).toEqual({ ok: true, value: undefined });

            expect(service.getSnapshot({ start: '2024-01-01', end: '2024-01-01' })).toEqual({
                ok: true,
                value: {
                    '2024-01-01': { Writing: { total_seconds: 1800, apps: { Notes: 1800 }, projects: { book: 1800 } } }
                }
            });
            expect(Object.keys(service.getSettings().getProjects())).toEqual(['book']);
        });

        test('不正な入力は ValidationError を返し例外を投げないこと', () => {
            const service = open();

            const result = service.recordManual('Notes', 'Writing', 0);

            expect(result.ok).toBe(false);
            if (!result.ok) {
                expect(result.error).toBeInstanceOf(ValidationError);
            }
            expect(service.getStore().dates()).toEqual([]);
        });
    });

    test('getSnapshot は不正な範囲を拒否すること', () => {
        const service = open();

        const reversed = service.getSnapshot({ start: '2024-01-05', end: '2024-01-01' });
        const malformed = service.getSnapshot({ start: 'yesterday', end: '2024-01-01' });

        expect(reversed.ok).toBe(false);
        expect(malformed.ok).toBe(false);
    });

    test('exportCsv はファイルに書き出すこと', () => {
        const service = open();
        service.recordManual('Notes', 'Writing', 30, null, '2024-01-01');
        const target = path.join(dataDir, 'out', 'export.csv');

        const result = service.exportCsv(target, { start: '2024-01-01', end: '2024-01-31' });

        expect(result).toEqual({ ok: true, value: { filePath: target, rows: 1 } });
        expect(fs.readFileSync(target, 'utf8')).toBe('Date,Category,App,Hours,Project\n2024-01-01,Writing,Notes,0.5000,\n');
    });

    test('exportRange は行を返すこと', () => {
        const service = open();
        service.recordManual('Notes', 'Writing', 15, null, '2024-01-01');

        expect(service.exportRange({ start: '2024-01-01', end: '2024-01-01' })).toEqual({
            ok: true,
            value: [{ date: '2024-01-01', category: 'Writing', app: 'Notes', hours: 0.25, project: null }]
        });
    });

    test('開始・一時停止・再開・停止の状態を返すこと', async () => {
        const service = open();

        expect(await service.start()).toEqual({ ok: true, value: TrackingState.RUNNING_IDLE });
        await service.getLoop().tick();
        expect(service.getStatus().state).toBe(TrackingState.RUNNING_ACTIVE);

        expect(service.pause()).toEqual({ ok: true, value: TrackingState.PAUSED });
        expect(service.resume()).toEqual({ ok: true, value: TrackingState.RUNNING_IDLE });

        await service.getLoop().tick();
        now = base + 5000;
        expect(await service.stop()).toEqual({ ok: true, value: TrackingState.STOPPED });
        expect(service.getStore().snapshotFor('2024-01-15').Coding.total_seconds).toBe(5);
    });

    test('setProject は未登録のプロジェクトを登録すること', () => {
        const service = open();
        service.setProject('alpha');

        expect(service.getStatus().session.currentProject).toBe('alpha');
        expect(Object.keys(service.getSettings().getProjects())).toEqual(['alpha']);
    });

    test('通知が無効なら通知しないこと', async () => {
        const service = open();
        service.recordManual('Editor', 'Coding', 240, null, '2024-01-14');
        service.getSettings().setNotificationsEnabled(false);

        await service.start();
        await service.stop();

        expect(notifier.notify).not.toHaveBeenCalled();
    });

    test('通知が有効なら連続日数の記録更新を通知すること', async () => {
        const service = open();
        service.recordManual('Editor', 'Coding', 240, null, '2024-01-14');

        await service.start();
        await service.stop();

        expect(notifier.notify).toHaveBeenCalledWith('New Record!', 'New longest streak: 1 days!');
    });
});
