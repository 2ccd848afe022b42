import { Entity, PrimaryGeneratedColumn, Column, Index, ManyToOne, JoinColumn } from "typeorm";
import { ILIDefinition, Meta } from "../types";
import { LexiconRow } from "./LexiconRow";

@Entity("synsets")
@Index(["lexiconRowId", "id"], { unique: true })
export class SynsetRow {
  @PrimaryGeneratedColumn({ name: "row_id" })
  rowId!: number;

  @Column({ type: "varchar" })
  id!: string;

  @Column({ type: "integer", name: "lexicon_row_id" })
  lexiconRowId!: number;

  @ManyToOne(() => LexiconRow, { onDelete: "CASCADE" })
  @JoinColumn({ name: "lexicon_row_id" })
  lexicon!: LexiconRow;

  @Column({ type: "varchar" })
  pos!: string;

  @Column({ type: "varchar", nullable: true })
  ili!: string | null;

  @Column("simple-json", { name: "ili_definition", nullable: true })
  iliDefinition!: ILIDefinition | null;

  @Column({ type: "varchar", nullable: true })
  lexfile!: string | null;

  @Column("simple-json", { nullable: true })
  members!: string[] | null;

  @Column("simple-json", { nullable: true })
  metadata!: Meta | null;
}
