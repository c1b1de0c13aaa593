throw new Error("module exploded on import");

export {};
