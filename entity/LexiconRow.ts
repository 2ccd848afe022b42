import { Entity, PrimaryGeneratedColumn, Column, Index } from "typeorm";
import { Meta, SyntacticBehaviour } from "../types";

@Entity("lexicons")
@Index(["id", "version"], { unique: true })
export class LexiconRow {
  @PrimaryGeneratedColumn({ name: "row_id" })
  rowId!: number;

  @Column({ type: "varchar" })
  id!: string;

  @Column({ type: "varchar" })
  label!: string;

  @Column({ type: "varchar" })
  language!: string;

  @Column({ type: "varchar" })
  email!: string;

  @Column({ type: "varchar" })
  license!: string;

  @Column({ type: "varchar" })
  version!: string;

  @Column({ type: "varchar", nullable: true })
  url!: string | null;

  @Column({ type: "text", nullable: true })
  citation!: string | null;

  @Column({ type: "varchar", name: "lmf_version" })
  lmfVersion!: string;

  // Lexicon-level syntactic behaviours that senses point at through subcat.
  @Column("simple-json", { nullable: true })
  frames!: SyntacticBehaviour[] | null;

  @Column("simple-json", { nullable: true })
  metadata!: Meta | null;
}
