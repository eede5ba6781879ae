export class DomainError extends Error {
  constructor(message?: string, options?: { cause?: unknown }) {
    super(message, options);
    // Fix para herencia correcta en TS/Node
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = new.target.name;
  }
}

export class InvalidConfigError extends DomainError {
  constructor(message = "Configuracion de exportacion invalida.") {
    super(message);
  }
}

export class InvalidCardListError extends DomainError {
  constructor(message = "Lista de cartas invalida.") {
    super(message);
  }
}

export class CacheWriteError extends DomainError {
  constructor(message = "No se pudo escribir en la cache.", options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class CacheFullError extends DomainError {
  constructor(message = "La cache no tiene espacio para esta imagen.") {
    super(message);
  }
}

export class CacheCorruptError extends DomainError {
  constructor(message = "Entrada de cache corrupta.", options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class ArtifactWriteError extends DomainError {
  constructor(message = "No se pudo escribir el archivo de salida.", options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class InvalidStateError extends DomainError {
  constructor(message = "Transicion de estado invalida.") {
    super(message);
  }
}

/**
 * Falla de todo el trabajo (capa de storage/render). Lleva los conteos
 * parciales para que el llamador no reciba un error generico.
 */
export class ExportJobError extends DomainError {
  constructor(
    message: string,
    readonly processed: number,
    readonly total: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}
