import type { Catalog, Tournament } from '../../types';

/** Sport keys in provider order. */
export function listSports(catalog: Catalog): string[] {
  return Object.keys(catalog);
}

/** Only active tournaments are ever shown or selectable. */
export function activeTournaments(catalog: Catalog, sport: string): Tournament[] {
  const tournaments = Object.prototype.hasOwnProperty.call(catalog, sport) ? catalog[sport] : [];
  return tournaments.filter((tournament) => tournament.active);
}

/** `Premier League` → `premier_league`. */
export function toEventKey(tournamentKey: string): string {
  return tournamentKey.toLowerCase().split(' ').join('_');
}

export function freezeCatalog(catalog: Catalog): Readonly<Catalog> {
  for (const tournaments of Object.values(catalog)) {
    tournaments.forEach((tournament) => Object.freeze(tournament));
    Object.freeze(tournaments);
  }
  return Object.freeze(catalog);
}
