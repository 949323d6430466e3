export function pluralize(count: number, noun: string): string {
	return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

/**
 * Human-readable byte count: B below 1 KB, then KB and MB with one decimal
 */
export function formatFileSize(size: number | undefined): string {
	if (size === undefined) {
		return 'unknown';
	}
	if (size < 1024) {
		return `${size} B`;
	}
	if (size < 1024 * 1024) {
		return `${(size / 1024).toFixed(1)} KB`;
	}
	return `${(size / (1024 * 1024)).toFixed(1)} MB`;
}

export function truncate(value: string, maxLength: number): string {
	if (value.length <= maxLength) {
		return value;
	}
	return `${value.slice(0, maxLength - 3)}...`;
}

export function shortId(id: string): string {
	return id.length > 8 ? `${id.slice(0, 8)}...` : id;
}

const pad = (value: number) => String(value).padStart(2, '0');

/**
 * Local time as YYYY-MM-DD HH:mm, with :ss when requested.
 * Unparseable input is returned unchanged.
 */
export function formatTimestamp(iso: string, withSeconds = false): string {
	const date = new Date(iso);
	if (Number.isNaN(date.getTime())) {
		return iso;
	}

	const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
	const time = `${pad(date.getHours())}:${pad(date.getMinutes())}`;
	return withSeconds
		? `${day} ${time}:${pad(date.getSeconds())}`
		: `${day} ${time}`;
}
