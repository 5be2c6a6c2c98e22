import os from 'node:os';
import path from 'node:path';

const isMac = process.platform === 'darwin';

function ensureAppName(app: string) {
	const trimmed = app.trim();
	return trimmed.length > 0 ? trimmed : 'zipext';
}

export function configDir(app = 'zipext') {
	const appName = ensureAppName(app);
	const override = process.env.ZIPEXT_HOME;
	if (override && override.length > 0) return override;
	const xdg = process.env.XDG_CONFIG_HOME;
	if (xdg && xdg.length > 0) return path.join(xdg, appName);
	const homeDir = os.homedir();
	if (isMac) return path.join(homeDir, 'Library', 'Application Support', appName);
	return path.join(homeDir, '.config', appName);
}

export function configFile(app = 'zipext') {
	return path.join(configDir(app), 'config.json');
}
