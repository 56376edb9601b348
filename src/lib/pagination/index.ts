export * from '$lib/pagination/types';
export * from '$lib/pagination/pageResult';
export * from '$lib/pagination/status';
export * from '$lib/pagination/state';
export * from '$lib/pagination/events';
export * from '$lib/pagination/equality';
export * from '$lib/pagination/transitions';
export * from '$lib/pagination/eventQueue';
export * from '$lib/pagination/errors';
export * from '$lib/pagination/config';
export * from '$lib/pagination/view';
